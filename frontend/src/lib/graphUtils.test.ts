import { describe, expect, it } from 'vitest';
import { edgeStrokeWidth, getNodeRelations, nodeRadius } from './graphUtils';
import { styleFor } from './graphBuilder';
import type { GraphData } from '../types/graph';

const graph: GraphData = {
  nodes: [
    { id: 'a', label: 'A', category: 'raw', ...styleFor('raw') },
    { id: 'b', label: 'B', category: 'physics', ...styleFor('physics') },
    { id: 'c', label: 'C', category: 'physics', ...styleFor('physics') },
    { id: 'y', label: 'Y', category: 'outcome', ...styleFor('outcome') },
  ],
  edges: [
    { source: 'a', target: 'b', weight: 0.4 },
    { source: 'a', target: 'c', weight: 0.9 },
    { source: 'b', target: 'y', weight: 0.5 },
    { source: 'c', target: 'y', weight: 0.7 },
  ],
};

describe('getNodeRelations', () => {
  it('lists neighbours on both sides, strongest first', () => {
    const { incoming, outgoing } = getNodeRelations(graph, 'a');
    expect(incoming).toEqual([]);
    expect(outgoing.map((r) => [r.node.id, r.weight])).toEqual([
      ['c', 0.9],
      ['b', 0.4],
    ]);

    const toOutcome = getNodeRelations(graph, 'y');
    expect(toOutcome.incoming.map((r) => r.node.id)).toEqual(['c', 'b']);
    expect(toOutcome.outgoing).toEqual([]);
  });

  it('returns nothing for an unknown node', () => {
    expect(getNodeRelations(graph, 'missing')).toEqual({ incoming: [], outgoing: [] });
  });
});

describe('edgeStrokeWidth', () => {
  it('maps weights onto 1 to 6 pixels', () => {
    expect(edgeStrokeWidth(0)).toBe(1);
    expect(edgeStrokeWidth(0.5)).toBe(3.5);
    expect(edgeStrokeWidth(1)).toBe(6);
  });

  it('clamps weights outside [0, 1]', () => {
    expect(edgeStrokeWidth(-2)).toBe(1);
    expect(edgeStrokeWidth(1.1)).toBe(6);
  });
});

describe('nodeRadius', () => {
  it('draws outcomes larger', () => {
    expect(nodeRadius({ category: 'outcome' })).toBe(27.5);
    expect(nodeRadius({ category: 'statistical' })).toBe(22.5);
  });
});
