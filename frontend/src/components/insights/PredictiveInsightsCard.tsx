import { Sparkles } from 'lucide-react';
import { ACTION_CARDS, MODEL_PERFORMANCE } from '../../data/insights';
import { Button } from '../ui/button';

const priorityClasses = {
  high: 'bg-red-900/60 text-red-300 border-red-700',
  medium: 'bg-amber-900/60 text-amber-300 border-amber-700',
};

export function PredictiveInsightsCard() {
  return (
    <div className="space-y-4">
      <h3 className="flex items-center gap-2 text-lg font-semibold text-white">
        <Sparkles className="h-5 w-5 text-violet-400" />
        Predictive Insights
      </h3>

      <div className="space-y-3">
        {ACTION_CARDS.map((card) => (
          <div key={card.title} className="rounded-lg border border-slate-700 bg-slate-700/40 p-4">
            <div className="flex items-center gap-2">
              <span className={`rounded border px-2 py-0.5 text-[10px] font-bold ${priorityClasses[card.priority]}`}>
                {card.badge}
              </span>
              <span className="text-sm font-semibold text-white">{card.title}</span>
            </div>
            <p className="mt-2 text-xs text-slate-300">{card.description}</p>
            <Button
              size="sm"
              variant={card.priority === 'high' ? 'default' : 'secondary'}
              className="mt-3"
            >
              {card.action}
            </Button>
          </div>
        ))}
      </div>

      <div>
        <h4 className="text-sm font-semibold text-slate-200">Model Performance</h4>
        <div className="mt-2 text-xs text-slate-400">{MODEL_PERFORMANCE}</div>
      </div>
    </div>
  );
}
