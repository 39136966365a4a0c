import React from 'react';
import type { EventStream } from './services/eventStream';
import { EventStreamProvider } from './components/EventStreamProvider';
import NotificationFeed from './components/NotificationFeed';

export interface AppProps {
  stream: EventStream;
}

const App: React.FC<AppProps> = ({ stream }) => (
  <EventStreamProvider stream={stream}>
    <main className="min-h-screen bg-slate-950 text-slate-200 p-6">
      <div className="max-w-3xl mx-auto space-y-6">
        <header>
          <h1 className="text-2xl font-semibold text-slate-100">Activity</h1>
          <p className="text-sm text-slate-400 mt-1">Live notifications pushed by the server.</p>
        </header>
        <NotificationFeed />
      </div>
    </main>
  </EventStreamProvider>
);

export default App;
