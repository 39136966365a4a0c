import { z } from 'zod';

export const NotificationSchema = z
  .object({
    type: z.string().min(1),
  })
  .passthrough();

/** A pushed message: a routing `type` plus whatever fields the publisher sent. */
export type StreamNotification = z.infer<typeof NotificationSchema>;

export interface ServerNotification<T = unknown> {
  id: string;
  type: string;
  data: T;
  time: string;
}

export const PublishRequestSchema = z.object({
  type: z.string().trim().min(1).max(200),
  data: z.unknown().optional(),
});

export type PublishRequest = z.infer<typeof PublishRequestSchema>;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: Error };

export const parseNotification = (raw: string): ParseResult<StreamNotification> => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
  }
  const result = NotificationSchema.safeParse(decoded);
  if (!result.success) {
    const issue = result.error.issues[0];
    return { ok: false, error: new Error(`Invalid notification: ${issue ? issue.message : 'unknown shape'}`) };
  }
  return { ok: true, value: result.data };
};

export const encodeNotification = (value: StreamNotification | ServerNotification): string => JSON.stringify(value);
