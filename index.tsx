import React from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import { createEventStream } from './services/eventStream';
import { createLogger } from './shared/logger';

const timeoutSeconds = Number(import.meta.env.VITE_STREAM_TIMEOUT);

// Built once here and handed down through context.
const stream = createEventStream({
  settings: {
    apiRoot: import.meta.env.VITE_API_ROOT || '/api/v1',
    idleTimeoutSeconds: Number.isInteger(timeoutSeconds) && timeoutSeconds > 0 ? timeoutSeconds : null,
  },
  logger: createLogger({ level: import.meta.env.DEV ? 'debug' : 'warn', scope: 'event-stream' }),
});

const container = document.getElementById('root');
if (!container) {
  throw new Error('Missing #root element');
}

createRoot(container).render(
  <React.StrictMode>
    <App stream={stream} />
  </React.StrictMode>,
);
