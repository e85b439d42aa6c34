import log from 'electron-log/node';

export interface DiagnosticLogger {
  error(...params: unknown[]): void;
  warn(...params: unknown[]): void;
  info(...params: unknown[]): void;
  debug(...params: unknown[]): void;
}

const logFile = process.env.SWIV_LOG_FILE;

if (logFile) {
  log.transports.file.level = 'info';
  log.transports.file.resolvePathFn = () => logFile;
} else {
  log.transports.file.level = false;
}

if (process.env.NODE_ENV === 'test') {
  log.transports.console.level = false;
}

export const createLogger = (scope: string): DiagnosticLogger => log.scope(scope);
