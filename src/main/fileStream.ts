import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import type { FileEntry } from '../types/entry';
import { FileOpenError } from './errors';

export const CHUNK_SIZE = 4096;

/**
 * Lazily reads a file in `CHUNK_SIZE` pieces. The handle is opened on the
 * first pull and closed exactly once, whether the consumer drains the
 * stream, stops early or a read fails.
 */
export async function* streamFile(file: FileEntry): AsyncGenerator<Buffer> {
  let handle: FileHandle;
  try {
    handle = await fs.open(file.pathname, 'r');
  } catch (error) {
    throw new FileOpenError(file.pathname, { cause: error });
  }

  try {
    while (true) {
      const buffer = Buffer.alloc(CHUNK_SIZE);
      const { bytesRead } = await handle.read(buffer, 0, CHUNK_SIZE, null);
      if (bytesRead === 0) {
        return;
      }
      yield bytesRead === CHUNK_SIZE ? buffer : buffer.subarray(0, bytesRead);
    }
  } finally {
    await handle.close();
  }
}
