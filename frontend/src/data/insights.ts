// Pre-written panel content; nothing here is computed from live data

export type Trend = 'up' | 'down' | 'stable';

export interface FeatureImportance {
  name: string;
  score: number;
  trend: Trend;
}

export interface ActionCard {
  priority: 'high' | 'medium';
  badge: string;
  title: string;
  description: string;
  action: string;
}

export const FEATURE_IMPORTANCE: readonly FeatureImportance[] = [
  { name: 'Temperature Anomaly', score: 0.91, trend: 'up' },
  { name: 'MBT Consecutive High', score: 0.85, trend: 'up' },
  { name: 'Power Efficiency', score: 0.78, trend: 'stable' },
  { name: 'Rotor & MBT Low', score: 0.72, trend: 'down' },
  { name: 'Volatility Flag', score: 0.68, trend: 'up' },
];

export const MODEL_ACCURACY = '97.3%';

export const KEY_INSIGHTS: readonly string[] = [
  'Power efficiency degrading over last 10 days',
  'Temperature anomaly correlates with failure risk',
  'Rotor response patterns indicate wear',
];

export const ACTION_CARDS: readonly ActionCard[] = [
  {
    priority: 'high',
    badge: 'CRITICAL',
    title: 'Outage Risk: 78%',
    description:
      'Multiple indicators suggest potential failure within 48-72 hours. Main bearing temperature showing consecutive highs.',
    action: 'View Details',
  },
  {
    priority: 'medium',
    badge: 'WARNING',
    title: 'Efficiency Drop',
    description:
      'Power efficiency ratio below optimal threshold. Rotor response lagging wind speed changes.',
    action: 'Analyze',
  },
];

export const MODEL_PERFORMANCE = 'Precision: 0.94 | Recall: 0.89 | F1: 0.91';

export interface LandingStat {
  value: string;
  label: string;
}

export const LANDING_STATS: readonly LandingStat[] = [
  { value: '12', label: 'Sensor Types' },
  { value: '35+', label: 'Graph Nodes' },
  { value: '98%', label: 'Accuracy' },
  { value: '24/7', label: 'Monitoring' },
];

export const PREVIEW_IMAGES: readonly string[] = ['img/wind1.svg', 'img/wind2.svg', 'img/wind3.svg'];
