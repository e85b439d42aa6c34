import http from 'http';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import { pipeline } from 'stream/promises';
import type { ChunkStream } from '../types/entry';
import type { GalleryRequest, GalleryResponse } from '../types/http';
import { createLogger, type DiagnosticLogger } from '../utils/logger';
import { logRequest, logRequestError } from '../utils/requestLogger';
import { BadRequestError } from './errors';
import { internalErrorResponse, plainResponse } from './response';
import { Router } from './router';

export interface GalleryServerOptions {
  baseDir: string;
  authSecret: string;
  logger?: DiagnosticLogger;
}

const ALLOWED_METHODS = ['GET', 'HEAD'];

export const toGalleryRequest = (req: IncomingMessage): GalleryRequest => {
  const [rawPath, ...rawQuery] = (req.url ?? '/').split('?');
  const searchParams = new URLSearchParams(rawQuery.join('?'));
  return {
    pathname: () => {
      try {
        return decodeURIComponent(rawPath ?? '/');
      } catch {
        throw new BadRequestError('Malformed URL encoding');
      }
    },
    query: (key) => searchParams.get(key) ?? '',
    header: (key) => {
      const value = req.headers[key.toLowerCase()];
      if (Array.isArray(value)) {
        return value.join(', ');
      }
      return value ?? '';
    },
  };
};

async function* resume(
  first: IteratorResult<Buffer>,
  iterator: AsyncIterator<Buffer>,
): AsyncGenerator<Buffer> {
  try {
    let result = first;
    while (!result.done) {
      yield result.value;
      result = await iterator.next();
    }
  } finally {
    await iterator.return?.();
  }
}

export interface WriteResponseOptions {
  omitBody?: boolean;
  /** Called when a stream body fails before its first chunk */
  onOpenError?: (error: unknown) => void;
}

const writeChunks = async (
  res: ServerResponse,
  response: GalleryResponse,
  chunks: ChunkStream,
  onOpenError: (error: unknown) => void,
) => {
  const iterator = chunks[Symbol.asyncIterator]();
  let first: IteratorResult<Buffer>;
  try {
    first = await iterator.next();
  } catch (error) {
    onOpenError(error);
    await writeResponse(res, internalErrorResponse());
    return;
  }
  res.writeHead(response.status, response.headers);
  await pipeline(resume(first, iterator), res);
};

/**
 * Writes a routed response. Stream bodies pull their first chunk before the
 * head goes out, so a file that cannot be opened still becomes a 500.
 */
export const writeResponse = async (
  res: ServerResponse,
  response: GalleryResponse,
  options: WriteResponseOptions = {},
): Promise<void> => {
  const { body } = response;
  if (options.omitBody) {
    res.writeHead(response.status, response.headers);
    res.end();
    return;
  }
  if (body.type === 'text') {
    res.writeHead(response.status, response.headers);
    res.end(body.text);
    return;
  }
  await writeChunks(
    res,
    response,
    body.chunks,
    options.onOpenError ?? ((error) => logRequestError(error, { stage: 'stream' })),
  );
};

const isPrematureClose = (error: unknown) =>
  error instanceof Error &&
  'code' in error &&
  error.code === 'ERR_STREAM_PREMATURE_CLOSE';

export const createRequestHandler = (options: GalleryServerOptions) => {
  const logger = options.logger ?? createLogger('server');
  const router = new Router({ ...options, logger });

  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const startedAt = Date.now();
    const method = req.method ?? 'GET';
    const url = req.url ?? '/';

    let response: GalleryResponse;
    if (!ALLOWED_METHODS.includes(method)) {
      response = plainResponse(405, 'Method not allowed', { Allow: ALLOWED_METHODS.join(', ') });
    } else {
      response = await router.route(toGalleryRequest(req));
    }

    try {
      await writeResponse(res, response, {
        omitBody: method === 'HEAD',
        onOpenError: (error) => logger.error(`Failed to open ${url}`, error),
      });
    } catch (error) {
      if (isPrematureClose(error)) {
        logger.debug(`Client closed ${method} ${url} before the body was sent`);
      } else {
        logRequestError(error, {
          method,
          url,
          stage: 'stream',
          status: res.statusCode,
          durationMs: Date.now() - startedAt,
        });
        res.destroy();
      }
    }

    logRequest({
      method,
      url,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
      bodyType: response.body.type,
    });
  };
};

export const createGalleryServer = (options: GalleryServerOptions): Server => {
  const handler = createRequestHandler(options);
  return http.createServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      logRequestError(error, { method: req.method, url: req.url, stage: 'unknown' });
      res.destroy();
    });
  });
};
