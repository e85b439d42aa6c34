import type { ChunkStream } from './entry';

export type ResponseHeaders = Record<string, string>;

export type ResponseBody =
  | { type: 'text'; text: string }
  | { type: 'stream'; chunks: ChunkStream };

export interface GalleryResponse {
  status: number;
  headers: ResponseHeaders;
  body: ResponseBody;
}

/**
 * Read-only view over one inbound request.
 */
export interface GalleryRequest {
  /** URL-decoded path without the query string */
  pathname(): string;
  /** Value of a query parameter, or '' when it is missing */
  query(key: string): string;
  /** Value of a request header (case-insensitive), or '' when it is missing */
  header(key: string): string;
}

export type ViewMode = 'gallery' | 'viewer';
