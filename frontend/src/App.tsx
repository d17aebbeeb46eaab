import { BookOpen, LayoutDashboard, Settings, Wind } from 'lucide-react';
import { useFlowStore } from './stores/flowStore';
import { Button } from './components/ui/button';
import { ErrorBoundary } from './components/ui/ErrorBoundary';
import { ScenarioSelect } from './components/scenario/ScenarioSelect';
import { LoadingScreen } from './components/loading/LoadingScreen';
import { GraphExplorer } from './components/graph/GraphExplorer';

export function App() {
  const stage = useFlowStore((s) => s.stage);
  const openSettings = useFlowStore((s) => s.openSettings);

  return (
    <div className="min-h-screen bg-slate-900 text-slate-100">
      <header className="flex items-center justify-between border-b border-slate-800 px-8 py-4">
        <div className="flex items-center gap-3">
          <Wind className="h-7 w-7 text-sky-400" />
          <h1 className="text-xl font-bold">Sentinel</h1>
        </div>
        <nav className="flex gap-2">
          <Button variant="ghost" size="sm">
            <BookOpen className="h-4 w-4 mr-2" />
            Documentation
          </Button>
          <Button variant="ghost" size="sm">
            <LayoutDashboard className="h-4 w-4 mr-2" />
            Dashboard
          </Button>
          <Button variant="ghost" size="sm" onClick={openSettings}>
            <Settings className="h-4 w-4 mr-2" />
            Settings
          </Button>
        </nav>
      </header>

      <main className="mx-auto max-w-[1600px] px-8 py-8">
        <ErrorBoundary>
          {stage === 'select' && <ScenarioSelect />}
          {stage === 'loading' && <LoadingScreen />}
          {stage === 'graph_view' && <GraphExplorer />}
        </ErrorBoundary>
      </main>
    </div>
  );
}
