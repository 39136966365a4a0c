import { EventEmitter } from 'node:events';
import type { Response } from 'express';

/** Records what a handler writes; enough of `Response` for the SSE and JSON routes. */
export class FakeResponse extends EventEmitter {
  headers: Record<string, string> = {};
  chunks: string[] = [];
  ended = false;
  statusCode = 200;
  body: unknown = undefined;

  setHeader(name: string, value: string) {
    this.headers[name.toLowerCase()] = value;
    return this;
  }

  flushHeaders() {}

  write(chunk: string) {
    this.chunks.push(chunk);
    return true;
  }

  end() {
    this.ended = true;
    return this;
  }

  status(code: number) {
    this.statusCode = code;
    return this;
  }

  json(body: unknown) {
    this.body = body;
    this.ended = true;
    return this;
  }

  output() {
    return this.chunks.join('');
  }

  asResponse(): Response {
    return this as unknown as Response;
  }
}
