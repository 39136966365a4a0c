export interface SseStreamOptions {
  heartbeatMs: number;
  /** Close the stream once this long passes without a `send`. */
  idleTimeoutMs?: number;
  label?: string;
  onClose?: () => void;
}

export interface SseStream {
  controller: AbortController;
  /** Unnamed `data:` frame; arrives at `EventSource.onmessage`. */
  send: (payload: unknown) => void;
  sendJson: (eventName: string, payload: unknown) => void;
  close: () => void;
  readonly closed: boolean;
}
