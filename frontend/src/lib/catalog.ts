/**
 * Fixed registry of every feature node and relationship edge in the
 * turbine knowledge graph.
 *
 * The registry is validated when it is created: a duplicate id, an unknown
 * category, an edge pointing at a missing node or a weight outside [0, 1]
 * throws `CatalogValidationError` instead of surfacing later as a
 * silently-dropped edge.
 */

import catalogData from '../data/catalog.json';
import type {
  CatalogDefinition,
  CatalogEdge,
  FeatureCategory,
  FeatureNode,
} from '../types/graph';

export const FEATURE_CATEGORIES: readonly FeatureCategory[] = [
  'raw',
  'physics',
  'statistical',
  'anomaly',
  'outcome',
];

export class CatalogValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogValidationError';
  }
}

export interface Catalog {
  readonly nodes: readonly FeatureNode[];
  readonly edges: readonly CatalogEdge[];
  readonly byId: ReadonlyMap<string, FeatureNode>;
  byCategory(category: FeatureCategory): readonly FeatureNode[];
  has(id: string): boolean;
}

export function isFeatureCategory(value: string): value is FeatureCategory {
  return FEATURE_CATEGORIES.some((category) => category === value);
}

export function createCatalog(definition: CatalogDefinition): Catalog {
  const byId = new Map<string, FeatureNode>();

  for (const raw of definition.nodes) {
    if (!raw.id) {
      throw new CatalogValidationError(`Node "${raw.label}" has an empty id`);
    }
    if (byId.has(raw.id)) {
      throw new CatalogValidationError(`Duplicate node id "${raw.id}"`);
    }
    if (!isFeatureCategory(raw.category)) {
      throw new CatalogValidationError(
        `Node "${raw.id}" has unknown category "${raw.category}"`
      );
    }

    const node: FeatureNode = Object.freeze({
      id: raw.id,
      label: raw.label,
      category: raw.category,
    });
    byId.set(node.id, node);
  }

  const edges = definition.edges.map((edge) => {
    const name = `${edge.source} -> ${edge.target}`;
    if (!byId.has(edge.source)) {
      throw new CatalogValidationError(`Edge ${name} references unknown source "${edge.source}"`);
    }
    if (!byId.has(edge.target)) {
      throw new CatalogValidationError(`Edge ${name} references unknown target "${edge.target}"`);
    }
    if (!Number.isFinite(edge.weight) || edge.weight < 0 || edge.weight > 1) {
      throw new CatalogValidationError(`Edge ${name} has weight ${edge.weight} outside [0, 1]`);
    }
    return Object.freeze({ source: edge.source, target: edge.target, weight: edge.weight });
  });

  const nodes = Object.freeze([...byId.values()]);
  const grouped = new Map<FeatureCategory, readonly FeatureNode[]>(
    FEATURE_CATEGORIES.map((category) => [
      category,
      Object.freeze(nodes.filter((node) => node.category === category)),
    ])
  );

  return Object.freeze({
    nodes,
    edges: Object.freeze(edges),
    byId,
    byCategory: (category: FeatureCategory) => grouped.get(category) ?? [],
    has: (id: string) => byId.has(id),
  });
}

export const CATALOG: Catalog = createCatalog(catalogData);
