export interface DirEntry {
  type: 'dir';
  /** Location on disk, prefixed by the gallery base directory */
  pathname: string;
}

export interface FileEntry {
  type: 'file';
  /** Location on disk, prefixed by the gallery base directory */
  pathname: string;
}

export type Entry = DirEntry | FileEntry;

/** Forward-only byte sequence backed by a single open file handle. */
export type ChunkStream = AsyncIterable<Buffer>;
