// src/index.ts
//
// Public API for report templating and packaging steps

export { TabularView, type Row } from './metrics/table.js';
export { Metrics, parseDay, readSource, type DateRange } from './metrics/metrics.js';
export { mergeViews, type MergeResult } from './metrics/merge.js';
export { rank, parseCount, type Ranked, type Weight } from './metrics/ranking.js';
export {
  detectSchema,
  normalizeView,
  SCHEMAS,
  SEARCH_COLUMNS,
  SEARCH_SCHEMA,
  TRAFFIC_COLUMNS,
  TRAFFIC_SCHEMA,
  type MetricsKind,
  type MetricsSchema,
} from './metrics/schema.js';
export * from './metrics/errors.js';
export { buildReport, buildProjectReport, discoverProjects, summarizeMetrics } from './report/build-report.js';
export type { MetricsSummary, ProjectReport, ReportSummary, ProjectSources } from './report/types.js';
