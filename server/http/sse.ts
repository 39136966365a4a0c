import type { Response } from 'express';
import type { SseStreamOptions, SseStream } from '../../shared/sse';
import { silentLogger, type Logger } from '../../shared/logger';

const serialize = (payload: unknown): string => (typeof payload === 'string' ? payload : JSON.stringify(payload));

export const createSseStream = (
  res: Response,
  options: SseStreamOptions & { logger?: Logger },
): SseStream => {
  const logger = options.logger ?? silentLogger;

  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders?.();

  const controller = new AbortController();
  let closed = false;
  let idleTimer: ReturnType<typeof setTimeout> | null = null;

  const heartbeat = setInterval(() => {
    if (closed) {
      return;
    }
    try {
      res.write(': heartbeat\n\n');
    } catch (error) {
      logger.warn('SSE heartbeat write failed', { label: options.label, error });
      close();
    }
  }, options.heartbeatMs);

  const armIdleTimer = () => {
    if (options.idleTimeoutMs === undefined) {
      return;
    }
    if (idleTimer !== null) {
      clearTimeout(idleTimer);
    }
    idleTimer = setTimeout(() => {
      logger.debug('SSE stream idle timeout', { label: options.label, idleTimeoutMs: options.idleTimeoutMs });
      close();
    }, options.idleTimeoutMs);
  };

  function close() {
    if (closed) {
      return;
    }
    closed = true;
    clearInterval(heartbeat);
    if (idleTimer !== null) {
      clearTimeout(idleTimer);
      idleTimer = null;
    }
    controller.abort();
    res.end();
    try {
      options.onClose?.();
    } catch (error) {
      logger.error('SSE onClose observer failed', { label: options.label, error });
    }
  }

  res.on('close', close);

  const writeFrame = (lines: string[]) => {
    if (closed) {
      return;
    }
    try {
      res.write(`${lines.join('\n')}\n\n`);
    } catch (error) {
      close();
      throw error;
    }
  };

  armIdleTimer();

  return {
    controller,
    send: (payload) => {
      writeFrame([`data: ${serialize(payload)}`]);
      if (!closed) armIdleTimer();
    },
    sendJson: (eventName, payload) => writeFrame([`event: ${eventName}`, `data: ${serialize(payload)}`]),
    close,
    get closed() {
      return closed;
    },
  };
};
