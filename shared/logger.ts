import type { LogLevel } from './config';

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

export interface LoggerOptions {
  level: LogLevel;
  scope?: string;
}

const serializeMeta = (meta: LogMeta | undefined): LogMeta => {
  if (!meta) return {};
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
};

const emit = (level: LogLevel, message: string, scope: string | undefined, meta?: LogMeta) => {
  const base = {
    level,
    message,
    ts: new Date().toISOString(),
    ...(scope ? { scope } : {}),
    ...serializeMeta(meta),
  };
  const payload = JSON.stringify(base);
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(payload);
  } else if (level === 'warn') {
    console.warn(payload);
  } else {
    console.log(payload);
  }
  /* eslint-enable no-console */
};

export const createLogger = ({ level, scope }: LoggerOptions): Logger => {
  const threshold = levelWeights[level];
  const shouldLog = (candidate: LogLevel) => levelWeights[candidate] >= threshold;
  return {
    debug: (message, meta) => {
      if (shouldLog('debug')) emit('debug', message, scope, meta);
    },
    info: (message, meta) => {
      if (shouldLog('info')) emit('info', message, scope, meta);
    },
    warn: (message, meta) => {
      if (shouldLog('warn')) emit('warn', message, scope, meta);
    },
    error: (message, meta) => emit('error', message, scope, meta),
  };
};

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
