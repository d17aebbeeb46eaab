import type { GraphData, StyledNode } from '../types/graph';

export interface NodeRelation {
  node: StyledNode;
  weight: number;
}

export interface NodeRelations {
  incoming: NodeRelation[];
  outgoing: NodeRelation[];
}

/** Incoming and outgoing neighbours of a node within the rendered graph, strongest first */
export function getNodeRelations(graph: GraphData, nodeId: string): NodeRelations {
  const byId = new Map(graph.nodes.map((n) => [n.id, n]));
  const incoming: NodeRelation[] = [];
  const outgoing: NodeRelation[] = [];

  for (const edge of graph.edges) {
    if (edge.target === nodeId) {
      const source = byId.get(edge.source);
      if (source) incoming.push({ node: source, weight: edge.weight });
    }
    if (edge.source === nodeId) {
      const target = byId.get(edge.target);
      if (target) outgoing.push({ node: target, weight: edge.weight });
    }
  }

  const strongestFirst = (a: NodeRelation, b: NodeRelation) => b.weight - a.weight;
  return {
    incoming: incoming.sort(strongestFirst),
    outgoing: outgoing.sort(strongestFirst),
  };
}

/** Edge stroke width: weight [0, 1] maps linearly onto [1, 6] px */
export function edgeStrokeWidth(weight: number): number {
  const clamped = Math.min(1, Math.max(0, weight));
  return 1 + clamped * 5;
}

export function nodeRadius(node: Pick<StyledNode, 'category'>): number {
  return node.category === 'outcome' ? 27.5 : 22.5;
}
