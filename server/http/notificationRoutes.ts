import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { parseTimeoutParam, type ServerConfig } from '../../shared/config';
import type { Logger } from '../../shared/logger';
import { PublishRequestSchema, encodeNotification } from '../../shared/notifications';
import type { NotificationBus } from '../notifications/bus';
import { createSseStream } from './sse';

const ListQuerySchema = z.object({
  since: z.string().datetime({ offset: true }).optional(),
});

export interface NotificationRouteDeps {
  config: ServerConfig;
  bus: NotificationBus;
  logger: Logger;
}

type Handler = (req: Request, res: Response) => void;

/** `GET /stream?timeout=<s>`: pushes every notification published after connect. */
export const handleNotificationStream =
  ({ config, bus, logger }: NotificationRouteDeps): Handler =>
  (req, res) => {
    const timeoutSeconds = parseTimeoutParam(req.query.timeout, {
      fallback: config.stream.defaultTimeoutSeconds,
      max: config.stream.maxTimeoutSeconds,
    });

    let unsubscribe: () => void = () => {};
    const stream = createSseStream(res, {
      heartbeatMs: config.server.heartbeatIntervalMs,
      idleTimeoutMs: timeoutSeconds * 1000,
      label: 'notification-stream',
      logger,
      onClose: () => {
        unsubscribe();
        logger.debug('Notification stream closed', { subscribers: bus.subscriberCount() });
      },
    });

    unsubscribe = bus.subscribe((notification) => {
      try {
        stream.send(encodeNotification(notification));
      } catch (error) {
        logger.warn('Notification stream write failed', { error });
      }
    });
    logger.debug('Notification stream opened', { timeoutSeconds, subscribers: bus.subscriberCount() });
  };

export const handleListNotifications =
  ({ bus }: NotificationRouteDeps): Handler =>
  (req, res) => {
    const parsed = ListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid "since" parameter; expected an ISO-8601 timestamp' });
      return;
    }
    const since = parsed.data.since ? new Date(parsed.data.since) : undefined;
    res.json(bus.list({ since }));
  };

export const handlePublishNotification =
  ({ bus, logger }: NotificationRouteDeps): Handler =>
  (req, res) => {
    const parsed = PublishRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid notification', issues: parsed.error.issues });
      return;
    }
    const notification = bus.publish(parsed.data.type, parsed.data.data ?? null);
    logger.info('Notification published', { id: notification.id, type: notification.type });
    res.status(201).json(notification);
  };

export const createNotificationRouter = (deps: NotificationRouteDeps): Router => {
  const router = Router();
  router.get('/stream', handleNotificationStream(deps));
  router.get('/', handleListNotifications(deps));
  router.post('/', handlePublishNotification(deps));
  return router;
};
