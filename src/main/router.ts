import fs from 'fs/promises';
import path from 'path';
import { isWithin, joinPath } from '../common/path';
import type { DirEntry, Entry } from '../types/entry';
import type { GalleryRequest, GalleryResponse, ViewMode } from '../types/http';
import { createLogger, type DiagnosticLogger } from '../utils/logger';
import { authenticate } from './auth';
import { BadRequestError, isRespondableError } from './errors';
import { classify } from './filesystem';
import { streamFile } from './fileStream';
import { mimetype } from './mimetype';
import { htmlResponse, internalErrorResponse, streamResponse } from './response';
import { GalleryView } from './views/galleryView';
import { ImageView } from './views/imageView';

export interface RouterOptions {
  /** Absolute directory every request is resolved against */
  baseDir: string;
  /** Shared Basic-Auth secret; empty disables authentication */
  authSecret: string;
  logger?: DiagnosticLogger;
}

export const resolveViewMode = (mode: string): ViewMode =>
  mode === 'viewer' ? 'viewer' : 'gallery';

const realpathOrNull = async (pathname: string): Promise<string | null> => {
  try {
    return await fs.realpath(pathname);
  } catch {
    return null;
  }
};

export class Router {
  private readonly baseDir: string;

  private readonly authSecret: string;

  private readonly logger: DiagnosticLogger;

  constructor({ baseDir, authSecret, logger }: RouterOptions) {
    this.baseDir = baseDir;
    this.authSecret = authSecret;
    this.logger = logger ?? createLogger('router');
  }

  async route(request: GalleryRequest): Promise<GalleryResponse> {
    try {
      authenticate(this.authSecret, request.header('authorization'));
      const entry = await this.resolve(request.pathname());
      if (!entry) {
        throw new BadRequestError();
      }
      if (entry.type === 'dir') {
        return htmlResponse(await this.render(entry, resolveViewMode(request.query('mode'))));
      }
      return streamResponse(mimetype(entry), streamFile(entry));
    } catch (error) {
      if (isRespondableError(error)) {
        return error.toResponse();
      }
      this.logger.error('Failed to route request', error);
      return internalErrorResponse();
    }
  }

  /**
   * Maps a decoded request path onto an entry below the base directory.
   * Paths that escape the base, lexically or through symlinks, resolve to
   * nothing.
   */
  async resolve(requestPath: string): Promise<Entry | null> {
    const pathname = path.resolve(joinPath(this.baseDir, requestPath));
    if (!isWithin(this.baseDir, pathname)) {
      return null;
    }

    const [realBase, realTarget] = await Promise.all([
      realpathOrNull(this.baseDir),
      realpathOrNull(pathname),
    ]);
    if (!realBase || !realTarget || !isWithin(realBase, realTarget)) {
      return null;
    }

    return classify(pathname);
  }

  private render(dir: DirEntry, mode: ViewMode): Promise<string> {
    const view = mode === 'viewer' ? new ImageView(this.baseDir) : new GalleryView(this.baseDir);
    return view.render(dir);
  }
}
