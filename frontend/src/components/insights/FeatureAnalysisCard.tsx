import { AlertTriangle, BarChart3, Lightbulb, Microscope, Target } from 'lucide-react';
import { CATALOG } from '../../lib/catalog';
import { KEY_INSIGHTS, MODEL_ACCURACY } from '../../data/insights';
import { CollapsibleSection } from '../ui/CollapsibleSection';

export function FeatureAnalysisCard() {
  const overview = [
    {
      icon: <Microscope className="h-5 w-5 text-emerald-400" />,
      label: 'Physics Features',
      value: `${CATALOG.byCategory('physics').length} Active`,
    },
    {
      icon: <BarChart3 className="h-5 w-5 text-violet-400" />,
      label: 'Statistical',
      value: `${CATALOG.byCategory('statistical').length} Active`,
    },
    {
      icon: <AlertTriangle className="h-5 w-5 text-red-400" />,
      label: 'Anomalies',
      value: `${CATALOG.byCategory('anomaly').length} Detected`,
    },
    {
      icon: <Target className="h-5 w-5 text-amber-400" />,
      label: 'Accuracy',
      value: MODEL_ACCURACY,
    },
  ];

  return (
    <div className="space-y-4">
      <h3 className="flex items-center gap-2 text-lg font-semibold text-white">
        <BarChart3 className="h-5 w-5 text-blue-400" />
        Feature Analysis
      </h3>

      <div className="grid grid-cols-2 gap-3">
        {overview.map((item) => (
          <div key={item.label} className="flex items-center gap-3 rounded-lg bg-slate-700/50 p-3">
            {item.icon}
            <div>
              <div className="text-xs text-slate-400">{item.label}</div>
              <strong className="text-sm text-white">{item.value}</strong>
            </div>
          </div>
        ))}
      </div>

      <CollapsibleSection
        title="Key Insights"
        icon={<Lightbulb className="h-4 w-4" />}
        badge={KEY_INSIGHTS.length}
        accent="outcome"
        defaultExpanded
      >
        <ul className="list-disc space-y-2 pl-5 pt-3 text-sm text-slate-300">
          {KEY_INSIGHTS.map((insight) => (
            <li key={insight}>{insight}</li>
          ))}
        </ul>
      </CollapsibleSection>
    </div>
  );
}
