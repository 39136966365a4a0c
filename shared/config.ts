import { z } from 'zod';

export const DEFAULT_STREAM_PATH = '/notification/stream';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const StreamSettingsSchema = z.object({
  apiRoot: z.string().default('/api/v1'),
  streamPath: z.string().min(1).default(DEFAULT_STREAM_PATH),
  idleTimeoutSeconds: z.number().int().positive().nullable().default(null),
  graceMs: z.number().int().positive().default(5000),
});

export type StreamSettings = z.infer<typeof StreamSettingsSchema>;
export type StreamSettingsInput = z.input<typeof StreamSettingsSchema>;

export const resolveStreamSettings = (input: StreamSettingsInput = {}): StreamSettings =>
  StreamSettingsSchema.parse(input);

export const ServerConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    apiPrefix: z.string().startsWith('/'),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  stream: z.object({
    defaultTimeoutSeconds: z.number().int().positive(),
    maxTimeoutSeconds: z.number().int().positive(),
    historySize: z.number().int().positive(),
  }),
  observability: z.object({
    logLevel: LogLevelSchema,
  }),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Whole seconds from a `timeout` query value, clamped to `[1, max]`.
 * Missing, blank or non-numeric input falls back.
 */
export const parseTimeoutParam = (
  value: unknown,
  { fallback, max }: { fallback: number; max: number },
): number => {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return fallback;
  }
  if (typeof value === 'string' && value.trim() === '') {
    return fallback;
  }
  const n = Number(value);
  if (!Number.isFinite(n)) {
    return fallback;
  }
  return Math.max(1, Math.min(max, Math.round(n)));
};
