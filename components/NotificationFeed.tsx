import React, { useCallback, useState } from 'react';
import type { StreamNotification } from '../shared/notifications';
import { useStreamConnection, useStreamEvent } from './EventStreamProvider';
import { Badge } from './ui/Badge';

export interface NotificationFeedProps {
  limit?: number;
}

type FeedEntry = {
  key: number;
  notification: StreamNotification;
};

const describePayload = (notification: StreamNotification): string => {
  const { type: _type, ...rest } = notification;
  const text = JSON.stringify(rest);
  return text === '{}' ? '' : text;
};

const NotificationFeed: React.FC<NotificationFeedProps> = ({ limit = 20 }) => {
  const status = useStreamConnection();
  const [entries, setEntries] = useState<FeedEntry[]>([]);

  const onNotification = useCallback(
    (notification: StreamNotification) => {
      setEntries((prev) => {
        const nextKey = prev.length > 0 ? prev[0].key + 1 : 0;
        return [{ key: nextKey, notification }, ...prev].slice(0, limit);
      });
    },
    [limit],
  );

  useStreamEvent('*', onNotification);

  return (
    <section className="bg-slate-900/60 border border-slate-800 rounded-xl p-6 shadow-lg">
      <div className="flex items-center justify-between mb-4 gap-4">
        <h2 className="text-lg font-semibold text-slate-100">Notifications</h2>
        <Badge tone={status === 'connected' ? 'live' : 'idle'} title="Notification stream">
          {status === 'connected' ? 'Live' : 'Offline'}
        </Badge>
      </div>
      {entries.length === 0 ? (
        <p className="text-sm text-slate-500">No notifications yet.</p>
      ) : (
        <ul className="divide-y divide-slate-800" aria-label="notifications">
          {entries.map(({ key, notification }) => (
            <li key={key} className="py-2 flex items-start gap-3">
              <Badge tone="info">{notification.type}</Badge>
              <code className="text-xs text-slate-400 break-all">{describePayload(notification)}</code>
            </li>
          ))}
        </ul>
      )}
    </section>
  );
};

export default NotificationFeed;
