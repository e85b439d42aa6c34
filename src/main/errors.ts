import type { GalleryResponse } from '../types/http';
import { plainResponse } from './response';

export const AUTH_REALM = 'swiv';

/**
 * Errors that map onto a specific client-facing response. Everything else
 * thrown while routing is flattened to a 500.
 */
export abstract class RespondableError extends Error {
  abstract toResponse(): GalleryResponse;
}

export class BadRequestError extends RespondableError {
  constructor(message = 'Bad request') {
    super(message);
    this.name = 'BadRequestError';
  }

  toResponse(): GalleryResponse {
    return plainResponse(400, 'Bad request');
  }
}

export class UnauthorizedError extends RespondableError {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
  }

  toResponse(): GalleryResponse {
    return plainResponse(401, 'Unauthorized', {
      'WWW-Authenticate': `Basic realm="${AUTH_REALM}"`,
    });
  }
}

export class FilesystemError extends Error {
  constructor(
    readonly pathname: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not scan directory: ${pathname}`, options);
    this.name = 'FilesystemError';
  }
}

export class FileOpenError extends Error {
  constructor(
    readonly pathname: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not read file: ${pathname}`, options);
    this.name = 'FileOpenError';
  }
}

export class CycleDetectedError extends Error {
  constructor(
    readonly pathname: string,
    readonly canonicalPath: string,
  ) {
    super(`Directory cycle at ${pathname} (resolves to ${canonicalPath})`);
    this.name = 'CycleDetectedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const isRespondableError = (error: unknown): error is RespondableError =>
  error instanceof RespondableError;
