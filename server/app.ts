import cors from 'cors';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { ServerConfig } from '../shared/config';
import type { Logger } from '../shared/logger';
import type { NotificationBus } from './notifications/bus';
import { createNotificationRouter } from './http/notificationRoutes';

export interface AppDeps {
  config: ServerConfig;
  bus: NotificationBus;
  logger: Logger;
}

export const createApp = ({ config, bus, logger }: AppDeps): Express => {
  const app = express();
  const prefix = config.server.apiPrefix;

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      let finished = false;
      res.on('finish', () => {
        finished = true;
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      res.on('close', () => {
        if (finished) return;
        logger.debug('HTTP closed early', {
          method: req.method,
          path: req.originalUrl,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get(`${prefix}/healthz`, (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString(), subscribers: bus.subscriberCount() });
  });

  app.use(`${prefix}/notification`, createNotificationRouter({ config, bus, logger }));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled route error', { method: req.method, path: req.originalUrl, error: err });
    if (res.headersSent) {
      res.end();
      return;
    }
    // body-parser marks malformed JSON with a 4xx status
    const status =
      typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
    res.status(status).json({ error: status < 500 ? 'Invalid request body' : 'Internal server error' });
  });

  return app;
};
