export { FeatureImportanceChart } from './FeatureImportanceChart';
