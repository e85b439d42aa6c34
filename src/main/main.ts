#!/usr/bin/env node
import fs from 'fs/promises';
import { createLogger } from '../utils/logger';
import { resolveServerConfig } from './config';
import { ConfigError } from './errors';
import { createGalleryServer } from './server';

const logger = createLogger('main');

const start = async () => {
  const config = resolveServerConfig();

  const stats = await fs.stat(config.baseDir).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new ConfigError(`Not a directory: ${config.baseDir}`);
  }

  const server = createGalleryServer({
    baseDir: config.baseDir,
    authSecret: config.authSecret,
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  logger.info(
    `Serving ${config.baseDir} on http://${config.host}:${config.port}/${config.authSecret ? ' (auth enabled)' : ''}`,
  );
};

start().catch((error: unknown) => {
  logger.error('Failed to start gallery server', error);
  process.exitCode = 1;
});
