import { useLayerStore } from '../../stores/layerStore';
import { InfoPanel } from '../insights/InfoPanel';
import { QueryPanel } from '../query/QueryPanel';
import { KnowledgeGraphViewer } from './KnowledgeGraphViewer';

export function GraphExplorer() {
  const graph = useLayerStore((s) => s.graph);

  return (
    <div className="space-y-6">
      <h2 className="text-2xl font-semibold text-white">Knowledge Graph Explorer</h2>
      <div className="grid gap-6 xl:grid-cols-[3fr_1fr]">
        <div className="h-[780px]">
          <KnowledgeGraphViewer graph={graph} />
        </div>
        <InfoPanel />
      </div>
      <QueryPanel />
    </div>
  );
}
