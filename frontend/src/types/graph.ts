export type FeatureCategory = 'raw' | 'physics' | 'statistical' | 'anomaly' | 'outcome';

export type OptionalCategory = Extract<FeatureCategory, 'physics' | 'statistical' | 'anomaly'>;

export interface FeatureNode {
  id: string;
  label: string;
  category: FeatureCategory;
}

export interface CatalogEdge {
  source: string;
  target: string;
  weight: number;
}

export interface CatalogDefinition {
  nodes: ReadonlyArray<{ id: string; label: string; category: string }>;
  edges: ReadonlyArray<CatalogEdge>;
}

export interface CategoryStyle {
  fill: string;
  border: string;
}

// Records handed to the renderer
export interface StyledNode extends FeatureNode, CategoryStyle {}

export interface WeightedEdge {
  source: string;
  target: string;
  weight: number;
}

export interface GraphData {
  nodes: StyledNode[];
  edges: WeightedEdge[];
}
