import { randomUUID } from 'node:crypto';
import type { ServerNotification } from '../../shared/notifications';

export type NotificationListener = (notification: ServerNotification) => void;

export interface NotificationBus {
  publish: <T>(type: string, data: T) => ServerNotification<T>;
  subscribe: (listener: NotificationListener) => () => void;
  list: (filter?: { since?: Date }) => ServerNotification[];
  subscriberCount: () => number;
}

export interface NotificationBusOptions {
  historySize: number;
  now?: () => Date;
  generateId?: () => string;
  onListenerError?: (error: unknown, notification: ServerNotification) => void;
}

/**
 * In-memory fan-out of published notifications. Keeps the last `historySize`
 * entries for listing; streams only see what is published after they subscribe.
 */
export const createNotificationBus = ({
  historySize,
  now = () => new Date(),
  generateId = randomUUID,
  onListenerError,
}: NotificationBusOptions): NotificationBus => {
  const history: ServerNotification[] = [];
  const listeners = new Set<NotificationListener>();

  return {
    publish: (type, data) => {
      const notification = { id: generateId(), type, data, time: now().toISOString() };
      history.push(notification);
      if (history.length > historySize) {
        history.splice(0, history.length - historySize);
      }
      for (const listener of Array.from(listeners)) {
        try {
          listener(notification);
        } catch (error) {
          onListenerError?.(error, notification);
        }
      }
      return notification;
    },
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    list: (filter = {}) => {
      const { since } = filter;
      if (!since) {
        return history.slice();
      }
      const cutoff = since.getTime();
      return history.filter((entry) => Date.parse(entry.time) > cutoff);
    },
    subscriberCount: () => listeners.size,
  };
};
