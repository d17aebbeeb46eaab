import React, { useState } from 'react';
import { ChevronDown, ChevronUp } from 'lucide-react';
import type { FeatureCategory } from '../../types/graph';

type Accent = FeatureCategory | 'slate';

interface CollapsibleSectionProps {
  title: string;
  icon?: React.ReactNode;
  badge?: string | number;
  accent?: Accent;
  defaultExpanded?: boolean;
  children: React.ReactNode;
  className?: string;
}

const accentClasses: Record<Accent, string> = {
  raw: 'bg-blue-900/50 text-blue-400',
  physics: 'bg-emerald-900/50 text-emerald-400',
  statistical: 'bg-violet-900/50 text-violet-400',
  anomaly: 'bg-red-900/50 text-red-400',
  outcome: 'bg-amber-900/50 text-amber-400',
  slate: 'bg-slate-700 text-slate-400',
};

export function CollapsibleSection({
  title,
  icon,
  badge,
  accent = 'slate',
  defaultExpanded = false,
  children,
  className = '',
}: CollapsibleSectionProps) {
  const [expanded, setExpanded] = useState(defaultExpanded);

  return (
    <div className={`bg-slate-800/50 rounded-lg border border-slate-700 overflow-hidden ${className}`}>
      <button
        type="button"
        aria-expanded={expanded}
        className="w-full flex items-center justify-between p-3 hover:bg-slate-800/80 transition-colors"
        onClick={() => setExpanded(!expanded)}
      >
        <div className="flex items-center gap-2">
          {icon && <div className={`p-1.5 rounded-lg ${accentClasses[accent]}`}>{icon}</div>}
          <span className="font-medium text-slate-200 text-sm">{title}</span>
          {badge !== undefined && (
            <span className={`px-1.5 py-0.5 text-xs rounded-full ${accentClasses[accent]}`}>
              {badge}
            </span>
          )}
        </div>
        <div className="text-slate-400">
          {expanded ? <ChevronUp className="w-4 h-4" /> : <ChevronDown className="w-4 h-4" />}
        </div>
      </button>

      {expanded && (
        <div className="p-3 pt-0 border-t border-slate-700/50">
          {children}
        </div>
      )}
    </div>
  );
}
