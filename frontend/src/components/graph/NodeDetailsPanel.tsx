import { ArrowLeft, ArrowRight, X } from 'lucide-react';
import type { GraphData, StyledNode } from '../../types/graph';
import { getNodeRelations, type NodeRelation } from '../../lib/graphUtils';
import { CATEGORY_LABELS } from './layerOptions';

interface NodeDetailsPanelProps {
  node: StyledNode;
  graph: GraphData;
  onClose: () => void;
}

function RelationList({ title, relations, direction }: {
  title: string;
  relations: NodeRelation[];
  direction: 'incoming' | 'outgoing';
}) {
  if (!relations.length) return null;
  const Icon = direction === 'incoming' ? ArrowLeft : ArrowRight;

  return (
    <div>
      <h3 className="text-sm font-semibold text-slate-300 mb-2">{title}</h3>
      <ul className="space-y-2">
        {relations.map(({ node, weight }) => (
          <li key={node.id} className="flex items-center gap-2 text-sm p-2 bg-slate-700/60 rounded">
            <Icon className="h-4 w-4 shrink-0" style={{ color: node.fill }} />
            <div className="flex-1">
              <div className="font-medium text-slate-100">{node.label}</div>
              <div className="text-slate-400 text-xs">{CATEGORY_LABELS[node.category]}</div>
            </div>
            <span className="text-xs text-slate-300 tabular-nums">{weight.toFixed(3)}</span>
          </li>
        ))}
      </ul>
    </div>
  );
}

export function NodeDetailsPanel({ node, graph, onClose }: NodeDetailsPanelProps) {
  const { incoming, outgoing } = getNodeRelations(graph, node.id);

  return (
    <aside aria-label="Node details" className="w-80 bg-slate-800 border-l border-slate-700 shadow-lg overflow-y-auto">
      <div className="p-6 space-y-4">
        <div className="flex items-start justify-between">
          <div className="flex-1">
            <h2 className="text-lg font-semibold text-white break-words">{node.label}</h2>
            <div className="flex flex-wrap gap-2 mt-2">
              <span className="px-2 py-1 bg-slate-700 text-slate-300 rounded text-xs font-mono">
                {node.id}
              </span>
              <span
                className="px-2 py-1 rounded text-xs font-medium text-white"
                style={{ backgroundColor: node.fill, borderColor: node.border }}
              >
                {CATEGORY_LABELS[node.category]}
              </span>
            </div>
          </div>
          <button onClick={onClose} aria-label="Close details" className="text-slate-400 hover:text-slate-200">
            <X className="h-5 w-5" />
          </button>
        </div>

        <RelationList title="Derived from" relations={incoming} direction="incoming" />
        <RelationList title="Feeds into" relations={outgoing} direction="outgoing" />

        {!incoming.length && !outgoing.length && (
          <p className="text-sm text-slate-400">No relationships in the active layers</p>
        )}
      </div>
    </aside>
  );
}
