import { CATEGORY_STYLES } from '../../lib/graphBuilder';
import type { FeatureCategory, OptionalCategory } from '../../types/graph';

export interface LayerOption {
  id: OptionalCategory;
  label: string;
  color: string;
}

export const LAYER_OPTIONS: readonly LayerOption[] = [
  { id: 'physics', label: 'Physics-Informed Features', color: CATEGORY_STYLES.physics.fill },
  { id: 'statistical', label: 'Statistical Features', color: CATEGORY_STYLES.statistical.fill },
  { id: 'anomaly', label: 'Anomaly Detection', color: CATEGORY_STYLES.anomaly.fill },
];

export const CATEGORY_LABELS: Record<FeatureCategory, string> = {
  raw: 'Raw Sensor',
  physics: 'Physics-Informed',
  statistical: 'Statistical',
  anomaly: 'Anomaly',
  outcome: 'Outcome',
};
