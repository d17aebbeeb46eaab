import type React from 'react';
import { config } from '../../lib/config';
import { useRotation } from '../../hooks/useRotation';
import { Card } from '../ui/card';
import { FeatureImportanceCard } from './FeatureImportanceCard';
import { FeatureAnalysisCard } from './FeatureAnalysisCard';
import { PredictiveInsightsCard } from './PredictiveInsightsCard';

const PANELS: ReadonlyArray<{ key: string; title: string; Component: () => React.ReactElement }> = [
  { key: 'importance', title: 'Feature Importance', Component: FeatureImportanceCard },
  { key: 'analysis', title: 'Feature Analysis', Component: FeatureAnalysisCard },
  { key: 'predictive', title: 'Predictive Insights', Component: PredictiveInsightsCard },
];

interface InfoPanelProps {
  intervalMs?: number;
}

export function InfoPanel({ intervalMs = config.infoRotationMs }: InfoPanelProps) {
  const { index, setIndex } = useRotation(PANELS.length, { intervalMs });
  const { Component } = PANELS[index];

  return (
    <Card className="p-6 space-y-4">
      <div aria-live="polite">
        <Component />
      </div>

      <div className="flex justify-center gap-2" role="tablist" aria-label="Info panels">
        {PANELS.map((panel, i) => (
          <button
            key={panel.key}
            type="button"
            role="tab"
            aria-selected={i === index}
            aria-label={panel.title}
            onClick={() => setIndex(i)}
            className={`h-2 w-2 rounded-full transition-colors ${i === index ? 'bg-blue-400' : 'bg-slate-600 hover:bg-slate-500'}`}
          />
        ))}
      </div>
    </Card>
  );
}
