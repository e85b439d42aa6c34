import fs from 'fs/promises';
import { compareOrdinal } from '../common/path';
import type { DirEntry, FileEntry } from '../types/entry';
import { CycleDetectedError } from './errors';
import { listChildren } from './filesystem';

const canonicalPath = async (pathname: string): Promise<string> => {
  try {
    return await fs.realpath(pathname);
  } catch {
    return pathname;
  }
};

async function* walkWithin(
  dir: DirEntry,
  ancestors: ReadonlySet<string>,
): AsyncGenerator<FileEntry> {
  const canonical = await canonicalPath(dir.pathname);
  if (ancestors.has(canonical)) {
    throw new CycleDetectedError(dir.pathname, canonical);
  }
  const descent = new Set(ancestors).add(canonical);

  const children = await listChildren(dir.pathname);
  for (const child of children) {
    if (child.type === 'dir') {
      yield* walkWithin(child, descent);
    } else {
      yield child;
    }
  }
}

/**
 * Depth-first walk yielding every file below `dir` in listing order.
 * Directories are descended into but never yielded. Each call reads the
 * filesystem afresh.
 */
export const walk = (dir: DirEntry): AsyncGenerator<FileEntry> =>
  walkWithin(dir, new Set());

export const collectSortedFiles = async (dir: DirEntry): Promise<FileEntry[]> => {
  const files: FileEntry[] = [];
  for await (const file of walk(dir)) {
    files.push(file);
  }
  return files.sort((a, b) => compareOrdinal(a.pathname, b.pathname));
};
