export { MetricsPlugin } from './metrics.js';
export type { MetricsOptions, OperationMetrics, TableMetrics } from './metrics.js';
