/**
 * Layered graph construction for the knowledge graph view.
 *
 * Raw sensors and outcomes are always shown; physics, statistical and anomaly
 * layers are added when their toggle is on. Node colours come from the
 * category alone, and edge weights get a small random jitter so the force
 * layout never settles into exactly the same picture twice.
 */

import { CATALOG, type Catalog } from './catalog';
import type {
  CategoryStyle,
  FeatureCategory,
  GraphData,
  OptionalCategory,
  StyledNode,
  WeightedEdge,
} from '../types/graph';

export const CATEGORY_STYLES: Readonly<Record<FeatureCategory, CategoryStyle>> = Object.freeze({
  raw: { fill: '#3b82f6', border: '#2563eb' },
  physics: { fill: '#10b981', border: '#059669' },
  statistical: { fill: '#8b5cf6', border: '#7c3aed' },
  anomaly: { fill: '#ef4444', border: '#dc2626' },
  outcome: { fill: '#f59e0b', border: '#d97706' },
});

export const OPTIONAL_CATEGORIES: readonly OptionalCategory[] = ['physics', 'statistical', 'anomaly'];

// Raw and outcome first, then optional layers in toggle order
const ALWAYS_ON: readonly FeatureCategory[] = ['raw', 'outcome'];

const JITTER_MIN = 0.9;
const JITTER_MAX = 1.1;

export function isOptionalCategory(token: string): token is OptionalCategory {
  return OPTIONAL_CATEGORIES.some((category) => category === token);
}

export function styleFor(category: FeatureCategory): CategoryStyle {
  const { fill, border } = CATEGORY_STYLES[category];
  return { fill, border };
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function jitterWeight(base: number, random: () => number = Math.random): number {
  const factor = JITTER_MIN + (JITTER_MAX - JITTER_MIN) * random();
  return round3(base * factor);
}

export function buildGraph(
  toggles: Iterable<string>,
  random: () => number = Math.random,
  catalog: Catalog = CATALOG
): GraphData {
  const enabled = new Set<OptionalCategory>();
  for (const token of toggles) {
    if (isOptionalCategory(token)) enabled.add(token);
  }

  const categories = [
    ...ALWAYS_ON,
    ...OPTIONAL_CATEGORIES.filter((category) => enabled.has(category)),
  ];

  const nodes: StyledNode[] = categories.flatMap((category) =>
    catalog.byCategory(category).map((node) => ({
      id: node.id,
      label: node.label,
      category: node.category,
      ...styleFor(node.category),
    }))
  );

  const present = new Set(nodes.map((n) => n.id));

  const edges: WeightedEdge[] = catalog.edges
    .filter((e) => present.has(e.source) && present.has(e.target))
    .map((e) => ({
      source: e.source,
      target: e.target,
      weight: jitterWeight(e.weight, random),
    }));

  return { nodes, edges };
}
