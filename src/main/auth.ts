import crypto from 'crypto';
import { UnauthorizedError } from './errors';

export const expectedAuthorization = (secret: string): string =>
  `Basic ${Buffer.from(secret, 'utf8').toString('base64')}`;

const sameBytes = (expected: string, actual: string) => {
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(actual, 'utf8');
  return a.length === b.length && crypto.timingSafeEqual(a, b);
};

/**
 * Throws `UnauthorizedError` unless the Authorization header carries the
 * configured secret. An empty secret turns the check off.
 */
export const authenticate = (secret: string, authorization: string): void => {
  if (!secret) {
    return;
  }
  if (!sameBytes(expectedAuthorization(secret), authorization)) {
    throw new UnauthorizedError();
  }
};
