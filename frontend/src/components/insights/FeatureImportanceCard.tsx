import { ArrowDown, ArrowRight, ArrowUp, Target } from 'lucide-react';
import { FEATURE_IMPORTANCE, type Trend } from '../../data/insights';
import { FeatureImportanceChart } from '../charts';

const trendIcons: Record<Trend, { Icon: typeof ArrowUp; className: string; label: string }> = {
  up: { Icon: ArrowUp, className: 'text-red-400', label: 'rising' },
  down: { Icon: ArrowDown, className: 'text-emerald-400', label: 'falling' },
  stable: { Icon: ArrowRight, className: 'text-slate-400', label: 'stable' },
};

export function FeatureImportanceCard() {
  return (
    <div className="space-y-4">
      <h3 className="flex items-center gap-2 text-lg font-semibold text-white">
        <Target className="h-5 w-5 text-amber-400" />
        Feature Importance
      </h3>

      <FeatureImportanceChart data={FEATURE_IMPORTANCE} />

      <ul className="space-y-2">
        {FEATURE_IMPORTANCE.map(({ name, score, trend }) => {
          const { Icon, className, label } = trendIcons[trend];
          return (
            <li key={name} className="flex items-center justify-between text-sm">
              <span className="text-slate-200">{name}</span>
              <span className="flex items-center gap-2">
                <span className="tabular-nums text-slate-300">{Math.round(score * 100)}%</span>
                <Icon className={`h-4 w-4 ${className}`} aria-label={label} />
              </span>
            </li>
          );
        })}
      </ul>

      <div className="text-xs text-slate-400">
        <span className="text-emerald-400 font-semibold">Live</span> • Physics-informed ML
      </div>
    </div>
  );
}
