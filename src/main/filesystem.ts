import fs from 'fs/promises';
import { joinPath } from '../common/path';
import type { Entry } from '../types/entry';
import { FilesystemError } from './errors';

/**
 * Classifies a pathname as a directory or a regular file, following
 * symlinks. Missing paths, broken links and permission failures all come
 * back as `null`.
 */
export const classify = async (pathname: string): Promise<Entry | null> => {
  try {
    const stats = await fs.stat(pathname);
    if (stats.isDirectory()) {
      return { type: 'dir', pathname };
    }
    if (stats.isFile()) {
      return { type: 'file', pathname };
    }
    return null;
  } catch {
    return null;
  }
};

export const listChildren = async (pathname: string): Promise<Entry[]> => {
  let names: string[];
  try {
    names = await fs.readdir(pathname);
  } catch (error) {
    throw new FilesystemError(pathname, { cause: error });
  }

  const entries = await Promise.all(
    names.map((name) => classify(joinPath(pathname, name))),
  );

  return entries.filter((entry): entry is Entry => entry !== null);
};
