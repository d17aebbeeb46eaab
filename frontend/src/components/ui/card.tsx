import React from 'react';

export function Card({ className = '', ...props }: React.HTMLAttributes<HTMLDivElement>) {
  return (
    <div
      className={`rounded-xl border border-slate-700 bg-slate-800/80 text-slate-100 shadow-lg ${className}`}
      {...props}
    />
  );
}
