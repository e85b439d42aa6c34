import fs from 'fs/promises';
import path from 'path';
import type { GalleryRequest, GalleryResponse } from '../types/http';
import { FilesystemError } from '../main/errors';
import { Router, resolveViewMode } from '../main/router';
import type { DiagnosticLogger } from '../utils/logger';
import { cleanup, collectChunks, makeTempDir, patternBytes, writeTree } from './helpers/tempTree';

interface RequestInit {
  pathname?: string;
  query?: Record<string, string>;
  headers?: Record<string, string>;
}

const makeRequest = ({ pathname = '/', query = {}, headers = {} }: RequestInit = {}): GalleryRequest => ({
  pathname: () => pathname,
  query: (key) => query[key] ?? '',
  header: (key) => headers[key.toLowerCase()] ?? '',
});

const makeLogger = (): jest.Mocked<DiagnosticLogger> => ({
  error: jest.fn(),
  warn: jest.fn(),
  info: jest.fn(),
  debug: jest.fn(),
});

const textOf = (response: GalleryResponse) => {
  if (response.body.type !== 'text') {
    throw new Error('Expected a text body');
  }
  return response.body.text;
};

const imageCount = (html: string) => html.split('<img ').length - 1;

describe('Router', () => {
  let root: string;
  let outside: string;
  let logger: jest.Mocked<DiagnosticLogger>;

  const createRouter = (authSecret = '') => new Router({ baseDir: root, authSecret, logger });

  beforeAll(async () => {
    root = await makeTempDir('swiv-router-');
    outside = await makeTempDir('swiv-outside-');
    await writeTree(root, {
      'photo.png': patternBytes(6000),
      'notes.unknownext': 'notes',
      'album/one.jpg': 'one',
      'album/deeper/two.jpg': 'two',
      'My Album/three.png': 'three',
    });
    await writeTree(outside, { 'private.png': 'private' });
    await fs.symlink(outside, path.join(root, 'escape'));
  });

  beforeEach(() => {
    logger = makeLogger();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(async () => {
    await cleanup(root);
    await cleanup(outside);
  });

  describe('authentication', () => {
    it('lets every request through when no secret is configured', async () => {
      const bare = await createRouter().route(makeRequest());
      const withHeader = await createRouter().route(
        makeRequest({ headers: { authorization: 'Basic d3Jvbmc=' } }),
      );
      expect(bare.status).toBe(200);
      expect(withHeader.status).toBe(200);
    });

    it('accepts the configured credential', async () => {
      const response = await createRouter('secret').route(
        makeRequest({ headers: { authorization: 'Basic c2VjcmV0' } }),
      );
      expect(response.status).toBe(200);
    });

    it('challenges requests without the credential', async () => {
      const router = createRouter('secret');
      const attempts: Array<Record<string, string>> = [{}, { authorization: 'Basic d3Jvbmc=' }];
      for (const headers of attempts) {
        const response = await router.route(makeRequest({ headers }));
        expect(response).toEqual({
          status: 401,
          headers: { 'Content-Type': 'text/plain', 'WWW-Authenticate': 'Basic realm="swiv"' },
          body: { type: 'text', text: 'Unauthorized' },
        });
      }
    });

    it('checks credentials before touching the filesystem', async () => {
      const response = await createRouter('secret').route(makeRequest({ pathname: '/missing.png' }));
      expect(response.status).toBe(401);
    });
  });

  describe('resolution', () => {
    it('answers missing paths with 400', async () => {
      const response = await createRouter().route(makeRequest({ pathname: '/missing.png' }));
      expect(response).toEqual({
        status: 400,
        headers: { 'Content-Type': 'text/plain' },
        body: { type: 'text', text: 'Bad request' },
      });
    });

    it('rejects paths that climb out of the base directory', async () => {
      const relativeOutside = path.relative(root, path.join(outside, 'private.png'));
      const response = await createRouter().route(
        makeRequest({ pathname: `/${relativeOutside}` }),
      );
      expect(response.status).toBe(400);
    });

    it('rejects links that resolve outside the base directory', async () => {
      const router = createRouter();
      expect((await router.route(makeRequest({ pathname: '/escape/private.png' }))).status).toBe(400);
      expect(await router.resolve('/escape')).toBeNull();
    });

    it('resolves the base directory itself', async () => {
      expect(await createRouter().resolve('/')).toEqual({ type: 'dir', pathname: root });
    });

    it('streams files with their detected content type', async () => {
      const response = await createRouter().route(makeRequest({ pathname: '/photo.png' }));

      expect(response.status).toBe(200);
      expect(response.headers).toEqual({ 'Content-Type': 'image/png' });
      if (response.body.type !== 'stream') {
        throw new Error('Expected a stream body');
      }
      const chunks = await collectChunks(response.body.chunks);
      expect(Buffer.concat(chunks).equals(patternBytes(6000))).toBe(true);
    });

    it('falls back to application/octet-stream', async () => {
      const response = await createRouter().route(makeRequest({ pathname: '/notes.unknownext' }));
      expect(response.headers['Content-Type']).toBe('application/octet-stream');
    });

    it('serves paths containing spaces', async () => {
      const response = await createRouter().route(makeRequest({ pathname: '/My Album/three.png' }));
      expect(response.status).toBe(200);
      expect(response.headers['Content-Type']).toBe('image/png');
    });
  });

  describe('directory views', () => {
    it('renders the gallery by default', async () => {
      const response = await createRouter().route(makeRequest({ pathname: '/album' }));

      expect(response.status).toBe(200);
      expect(response.headers).toEqual({ 'Content-Type': 'text/html; charset=utf-8' });
      const html = textOf(response);
      expect(html).toContain('<article><img src="/album/one.jpg" loading="lazy"></article>');
      expect(html).toContain('<label>deeper (1)</label>');
    });

    it('renders the viewer for mode=viewer', async () => {
      const response = await createRouter().route(
        makeRequest({ pathname: '/album', query: { mode: 'viewer' } }),
      );
      const html = textOf(response);
      expect(imageCount(html)).toBe(2);
      expect(html).not.toContain('<article>');
    });

    it('treats any other mode as the gallery', async () => {
      const response = await createRouter().route(
        makeRequest({ pathname: '/album', query: { mode: 'slideshow' } }),
      );
      expect(textOf(response)).toContain('<article>');
    });

    it('maps mode values onto views', () => {
      expect(resolveViewMode('viewer')).toBe('viewer');
      expect(resolveViewMode('')).toBe('gallery');
      expect(resolveViewMode('Viewer')).toBe('gallery');
    });
  });

  describe('internal failures', () => {
    it('logs the failure and answers with an opaque 500', async () => {
      jest.spyOn(fs, 'readdir').mockRejectedValueOnce(new Error(`EIO: ${root}`));

      const response = await createRouter().route(makeRequest({ pathname: '/album' }));

      expect(response).toEqual({
        status: 500,
        headers: { 'Content-Type': 'text/plain' },
        body: { type: 'text', text: 'Internal server error' },
      });
      expect(logger.error).toHaveBeenCalledWith('Failed to route request', expect.any(FilesystemError));
    });

    it('fails with 500 when a directory links back into its own ancestry', async () => {
      const loopRoot = path.join(root, 'looped');
      await writeTree(root, { 'looped/inner/a.png': 'a' });
      await fs.symlink(loopRoot, path.join(loopRoot, 'inner', 'back'));

      try {
        const response = await createRouter().route(
          makeRequest({ pathname: '/looped', query: { mode: 'viewer' } }),
        );
        expect(response.status).toBe(500);
        expect(logger.error).toHaveBeenCalledTimes(1);
      } finally {
        await cleanup(loopRoot);
      }
    });
  });
});
