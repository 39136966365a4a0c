import { ServerConfigSchema, LogLevelSchema, type ServerConfig } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export type { ServerConfig };

let cachedConfig: ServerConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const logLevel = LogLevelSchema.safeParse((env.LOG_LEVEL || 'info').trim().toLowerCase());

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 8080),
      apiPrefix: env.API_PREFIX?.trim() || '/api/v1',
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    stream: {
      // Matches the platform default: five minutes without a notification.
      defaultTimeoutSeconds: numberFromEnv(env.STREAM_DEFAULT_TIMEOUT_SECONDS, 300),
      maxTimeoutSeconds: numberFromEnv(env.STREAM_MAX_TIMEOUT_SECONDS, 3600),
      historySize: numberFromEnv(env.NOTIFICATION_HISTORY_SIZE, 200),
    },
    observability: {
      logLevel: logLevel.success ? logLevel.data : 'info',
    },
  };

  return ServerConfigSchema.parse(rawConfig);
};

export const loadConfig = (): ServerConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};
