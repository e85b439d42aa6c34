import util from 'util';
import { bold, cyan, dim, green, red, yellow } from 'colorette';

export type RequestStage = 'auth' | 'resolve' | 'render' | 'stream' | 'unknown';

export interface RequestLogInfo {
  method: string;
  url: string;
  status: number;
  durationMs: number;
  bodyType?: 'text' | 'stream';
}

export interface RequestErrorInfo {
  method?: string;
  url?: string;
  stage?: RequestStage;
  status?: number;
  durationMs?: number;
  context?: unknown;
}

const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

const isProductionBuild = () => {
  if (process.env.DEBUG_PROD === 'true') {
    return false;
  }
  return process.env.NODE_ENV === 'production';
};

const isVerboseEnabled = () =>
  coerceBoolean(process.env.SWIV_LOG_VERBOSE) && !isProductionBuild();

const shouldLogErrors = () => !isProductionBuild();

const timestamp = () => dim(new Date().toISOString());

const indentBlock = (value: string, indent = '   ') =>
  value.split('\n').map((line) => `${indent}${line}`).join('\n');

export const formatDuration = (durationMs: number) =>
  durationMs >= 1000 ? `${(durationMs / 1000).toFixed(2)} s` : `${Math.round(durationMs)} ms`;

const formatJson = (value: unknown) =>
  util.inspect(value, { colors: true, depth: 4, breakLength: 80, maxArrayLength: 20 });

const colourStatus = (status: number) => {
  const label = String(status);
  if (status >= 500) return red(label);
  if (status >= 400) return yellow(label);
  return green(label);
};

export const logRequest = (info: RequestLogInfo) => {
  if (!isVerboseEnabled()) return;
  const parts = [
    timestamp(),
    cyan('[swiv]'),
    bold(info.method),
    info.url,
    colourStatus(info.status),
    dim(`in ${formatDuration(info.durationMs)}`),
  ];
  if (info.bodyType === 'stream') {
    parts.push(dim('(streamed)'));
  }
  console.log(parts.join(' '));
};

export const logRequestError = (error: unknown, info: RequestErrorInfo = {}) => {
  if (!shouldLogErrors()) return;
  const err = error instanceof Error ? error : new Error(typeof error === 'string' ? error : 'Unknown request error');
  const target = info.method && info.url ? `${info.method} ${info.url}` : '';
  const header = `${timestamp()} ${red('[swiv] Request failed')} ${target}`.trim();
  const details: string[] = [];
  if (info.stage) {
    details.push(`Stage: ${info.stage}`);
  }
  if (info.status) {
    details.push(`HTTP status: ${info.status}`);
  }
  if (info.durationMs !== undefined) {
    details.push(`Duration: ${formatDuration(info.durationMs)}`);
  }
  if (info.context !== undefined) {
    details.push('Context:');
    details.push(indentBlock(formatJson(info.context)));
  }
  details.push(err.stack ?? err.message);

  console.error(header);
  details.forEach((detail) => {
    console.error(indentBlock(detail));
  });
};
