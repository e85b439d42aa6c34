import type { ChunkStream } from '../types/entry';
import type { GalleryResponse, ResponseHeaders } from '../types/http';

export const textResponse = (
  status: number,
  contentType: string,
  text: string,
  headers: ResponseHeaders = {},
): GalleryResponse => ({
  status,
  headers: { 'Content-Type': contentType, ...headers },
  body: { type: 'text', text },
});

export const htmlResponse = (html: string): GalleryResponse =>
  textResponse(200, 'text/html; charset=utf-8', html);

export const plainResponse = (
  status: number,
  text: string,
  headers: ResponseHeaders = {},
): GalleryResponse => textResponse(status, 'text/plain', text, headers);

export const streamResponse = (
  contentType: string,
  chunks: ChunkStream,
): GalleryResponse => ({
  status: 200,
  headers: { 'Content-Type': contentType },
  body: { type: 'stream', chunks },
});

export const internalErrorResponse = (): GalleryResponse =>
  plainResponse(500, 'Internal server error');
