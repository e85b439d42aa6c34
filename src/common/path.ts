import path from 'path';

export const relativeTo = (base: string, pathname: string): string =>
  pathname.startsWith(base) ? pathname.slice(base.length) : pathname;

export const joinPath = (a: string, b: string): string => {
  if (a.endsWith('/') && b.startsWith('/')) {
    return `${a}${b.slice(1)}`;
  }
  if (a.endsWith('/') || b.startsWith('/')) {
    return `${a}${b}`;
  }
  return `${a}/${b}`;
};

/**
 * Percent-encodes each segment of a `/`-separated path so it can be placed
 * in an `href` or `src` attribute and decoded back by the router.
 */
export const toHref = (relative: string): string =>
  relative
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');

export const isWithin = (base: string, candidate: string): boolean => {
  const relative = path.relative(base, candidate);
  if (relative === '') {
    return true;
  }
  if (path.isAbsolute(relative)) {
    return false;
  }
  return relative.split(path.sep)[0] !== '..';
};

export const basename = (pathname: string): string =>
  path.basename(pathname);

/** Byte-wise comparison of two paths, independent of locale. */
export const compareOrdinal = (a: string, b: string): number =>
  Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
