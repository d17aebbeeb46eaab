import React from 'react';
import { AlertTriangle, Info, Settings2, Wind } from 'lucide-react';
import { SCENARIOS } from '../../lib/scenario';
import { LANDING_STATS } from '../../data/insights';
import { useFlowStore } from '../../stores/flowStore';
import { Button } from '../ui/button';
import { Card } from '../ui/card';
import { Input } from '../ui/input';
import { LayerToggleList } from '../graph/LayerToggleList';
import { PreviewCarousel } from './PreviewCarousel';

export function ScenarioSelect() {
  const scenarioText = useFlowStore((s) => s.scenarioText);
  const notice = useFlowStore((s) => s.notice);
  const setScenarioText = useFlowStore((s) => s.setScenarioText);
  const selectScenarioChip = useFlowStore((s) => s.selectScenarioChip);
  const submitScenario = useFlowStore((s) => s.submitScenario);

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    submitScenario();
  };

  return (
    <div className="grid gap-6 lg:grid-cols-[2fr_1fr]">
      <Card className="p-8 space-y-8">
        <div className="space-y-3">
          <h2 className="text-4xl font-bold text-white">Build Your Causal Knowledge Graph</h2>
          <p className="text-slate-400">
            Select a scenario to analyze with our advanced AI-powered predictive maintenance system
          </p>
        </div>

        <form onSubmit={handleSubmit} className="space-y-4">
          <Input
            value={scenarioText}
            onChange={(e) => setScenarioText(e.target.value)}
            placeholder="Type or select a scenario below"
            aria-label="Scenario"
          />

          <div className="flex flex-wrap gap-2">
            {SCENARIOS.map((scenario) => (
              <button
                key={scenario.key}
                type="button"
                onClick={() => selectScenarioChip(scenario.key)}
                className="rounded-full border border-slate-600 bg-slate-700/60 px-4 py-1.5 text-sm text-slate-200 hover:bg-slate-600"
              >
                {scenario.chip}
              </button>
            ))}
          </div>

          {notice && (
            <div
              role="status"
              className={`flex items-center gap-2 rounded-lg border px-4 py-3 text-sm ${
                notice.kind === 'unsupported'
                  ? 'border-amber-700 bg-amber-900/30 text-amber-200'
                  : 'border-blue-700 bg-blue-900/30 text-blue-200'
              }`}
            >
              {notice.kind === 'unsupported' ? <AlertTriangle className="h-5 w-5" /> : <Info className="h-5 w-5" />}
              <span>{notice.message}</span>
            </div>
          )}

          <div className="flex items-center gap-4">
            <Button type="submit" size="lg">
              Generate Knowledge Graph
            </Button>
            <span className="text-xs text-slate-500">Uses precomputed data for instant generation</span>
          </div>
        </form>

        <div className="grid grid-cols-2 gap-4 md:grid-cols-4">
          {LANDING_STATS.map((stat) => (
            <div key={stat.label} className="rounded-lg bg-slate-700/40 p-4 text-center">
              <div className="text-2xl font-bold text-white">{stat.value}</div>
              <div className="text-xs text-slate-400">{stat.label}</div>
            </div>
          ))}
        </div>
      </Card>

      <Card className="p-6 space-y-6">
        <section className="space-y-2">
          <h3 className="flex items-center gap-2 font-semibold text-white">
            <Info className="h-4 w-4 text-blue-400" />
            Quick Info
          </h3>
          <p className="text-sm text-slate-400">
            Our knowledge graph visualization helps you understand complex relationships between sensors,
            derived metrics, and failure predictions.
          </p>
        </section>

        <section className="space-y-3">
          <h3 className="flex items-center gap-2 font-semibold text-white">
            <Settings2 className="h-4 w-4 text-emerald-400" />
            Configuration
          </h3>
          <p className="text-sm text-slate-400">Toggle different feature categories to focus on specific aspects:</p>
          <LayerToggleList />
        </section>

        <section className="space-y-3">
          <h3 className="flex items-center gap-2 font-semibold text-white">
            <Wind className="h-4 w-4 text-sky-400" />
            Wind Mills
          </h3>
          <PreviewCarousel />
        </section>
      </Card>
    </div>
  );
}
