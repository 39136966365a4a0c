import 'dotenv/config';
import { createLogger } from '../shared/logger';
import { createApp } from './app';
import { loadConfig } from './config/config';
import { createNotificationBus } from './notifications/bus';

const config = loadConfig();
const logger = createLogger({ level: config.observability.logLevel, scope: 'server' });
const bus = createNotificationBus({
  historySize: config.stream.historySize,
  onListenerError: (error, notification) =>
    logger.error('Notification subscriber failed', { id: notification.id, type: notification.type, error }),
});

logger.info('Config loaded', {
  environment: config.environment,
  apiPrefix: config.server.apiPrefix,
  stream: config.stream,
});

const app = createApp({ config, bus, logger });

const server = app.listen(config.server.port, () => {
  logger.info('Server listening', { port: config.server.port });
});

const shutdown = (signal: string) => {
  logger.info('Shutting down', { signal });
  server.close((error) => {
    if (error) {
      logger.error('Server close failed', { error });
      process.exitCode = 1;
    }
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
