import path from 'path';
import { parseArgs } from 'util';
import { ConfigError } from './errors';

export interface ServerConfig {
  /** Absolute gallery root */
  baseDir: string;
  authSecret: string;
  host: string;
  port: number;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = 'localhost';

const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port: ${value}`);
  }
  return port;
};

/**
 * Builds the server configuration from `--dir`, `--auth`, `--port` and
 * `--host`, falling back to the AUTH and PORT environment variables.
 */
export const resolveServerConfig = (
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ServerConfig => {
  let values: { dir?: string; auth?: string; port?: string; host?: string };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        dir: { type: 'string' },
        auth: { type: 'string' },
        port: { type: 'string' },
        host: { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }

  const portValue = values.port ?? env.PORT;

  return {
    baseDir: path.resolve(cwd, values.dir ?? '.'),
    authSecret: values.auth ?? env.AUTH ?? '',
    host: values.host ?? DEFAULT_HOST,
    port: portValue === undefined || portValue === '' ? DEFAULT_PORT : parsePort(portValue),
  };
};
