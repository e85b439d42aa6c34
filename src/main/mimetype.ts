import mime from 'mime-types';
import type { FileEntry } from '../types/entry';

export const FALLBACK_MIME_TYPE = 'application/octet-stream';

export const mimetype = (file: FileEntry): string =>
  mime.lookup(file.pathname) || FALLBACK_MIME_TYPE;
