import React from 'react';

export type BadgeTone = 'live' | 'idle' | 'info';

export interface BadgeProps {
  children: React.ReactNode;
  tone?: BadgeTone;
  title?: string;
}

const tones: Record<BadgeTone, string> = {
  live: 'bg-emerald-950/50 text-emerald-300 border-emerald-900/50',
  idle: 'bg-slate-800/50 text-slate-300 border-slate-700/50',
  info: 'bg-blue-950/50 text-blue-300 border-blue-900/50',
};

export const Badge: React.FC<BadgeProps> = ({ children, tone = 'info', title }) => (
  <span className={`inline-flex items-center px-2 py-0.5 rounded text-xs font-medium border ${tones[tone]}`} title={title}>
    {children}
  </span>
);
