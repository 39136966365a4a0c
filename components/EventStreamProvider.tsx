import React, { createContext, useContext, useEffect, useRef, useState } from 'react';
import type { EventStream } from '../services/eventStream';
import type { StreamNotification } from '../shared/notifications';

const EventStreamContext = createContext<EventStream | null>(null);

export interface EventStreamProviderProps {
  stream: EventStream;
  /** Open on mount and close on unmount. */
  autoOpen?: boolean;
  children: React.ReactNode;
}

/**
 * Hands the application's single notification stream to every consumer below it.
 * The stream is built once at startup and passed in; the provider never creates one.
 */
export const EventStreamProvider: React.FC<EventStreamProviderProps> = ({ stream, autoOpen = true, children }) => {
  useEffect(() => {
    if (!autoOpen) {
      return undefined;
    }
    stream.open();
    return () => stream.close();
  }, [stream, autoOpen]);

  return <EventStreamContext.Provider value={stream}>{children}</EventStreamContext.Provider>;
};

export const useEventStream = (): EventStream => {
  const stream = useContext(EventStreamContext);
  if (!stream) {
    throw new Error('useEventStream must be used within an EventStreamProvider');
  }
  return stream;
};

/** Calls `handler` for every `event.<type>` notification while the component is mounted. */
export const useStreamEvent = (type: string, handler: (notification: StreamNotification) => void): void => {
  const stream = useEventStream();
  const handlerRef = useRef(handler);
  handlerRef.current = handler;

  useEffect(() => {
    const key: `event.${string}` = `event.${type}`;
    return stream.on(key, (notification) => handlerRef.current(notification));
  }, [stream, type]);
};

export type ConnectionStatus = 'connected' | 'disconnected';

export const useStreamConnection = (): ConnectionStatus => {
  const stream = useEventStream();
  const [status, setStatus] = useState<ConnectionStatus>(() => (stream.isConnected() ? 'connected' : 'disconnected'));

  useEffect(() => {
    setStatus(stream.isConnected() ? 'connected' : 'disconnected');
    const offConnected = stream.on('stream.connected', () => setStatus('connected'));
    const offDisconnected = stream.on('stream.disconnected', () => setStatus('disconnected'));
    return () => {
      offConnected();
      offDisconnected();
    };
  }, [stream]);

  return status;
};
