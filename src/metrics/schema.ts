// src/metrics/schema.ts
//
// Recognized analytics export layouts. A header matches a schema when it
// contains every required column; extra export columns are dropped on load.

import { SchemaMismatchError } from './errors.js';
import type { TabularView } from './table.js';

export type MetricsKind = 'traffic' | 'search';

export interface MetricsSchema {
  kind: MetricsKind;
  /** Required columns, in normalized order */
  columns: readonly string[];
  /** Column holding the export date (or timestamp) */
  date: string;
  /** Columns that identify one record across overlapping exports */
  key: readonly string[];
}

export const TRAFFIC_COLUMNS = {
  DATE: 'Date',
  VERSION: 'Version',
  PATH: 'Path',
  VIEWS: 'Views',
} as const;

export const SEARCH_COLUMNS = {
  CREATED_DATE: 'Created Date',
  QUERY: 'Query',
  TOTAL_RESULTS: 'Total Results',
} as const;

export const TRAFFIC_SCHEMA: MetricsSchema = {
  kind: 'traffic',
  columns: [TRAFFIC_COLUMNS.DATE, TRAFFIC_COLUMNS.VERSION, TRAFFIC_COLUMNS.PATH, TRAFFIC_COLUMNS.VIEWS],
  date: TRAFFIC_COLUMNS.DATE,
  key: [TRAFFIC_COLUMNS.DATE, TRAFFIC_COLUMNS.VERSION, TRAFFIC_COLUMNS.PATH],
};

export const SEARCH_SCHEMA: MetricsSchema = {
  kind: 'search',
  columns: [SEARCH_COLUMNS.CREATED_DATE, SEARCH_COLUMNS.QUERY, SEARCH_COLUMNS.TOTAL_RESULTS],
  date: SEARCH_COLUMNS.CREATED_DATE,
  key: [SEARCH_COLUMNS.CREATED_DATE, SEARCH_COLUMNS.QUERY],
};

// Traffic is checked first: a header carrying both layouts counts as traffic
export const SCHEMAS: readonly MetricsSchema[] = [TRAFFIC_SCHEMA, SEARCH_SCHEMA];

export function matchesSchema(headers: readonly string[], schema: MetricsSchema): boolean {
  return schema.columns.every(column => headers.includes(column));
}

export function detectSchema(headers: readonly string[]): MetricsSchema | null {
  return SCHEMAS.find(schema => matchesSchema(headers, schema)) ?? null;
}

export function requireSchema(headers: readonly string[], source?: string): MetricsSchema {
  const schema = detectSchema(headers);
  if (!schema) {
    const where = source ? ` in ${source}` : '';
    throw new SchemaMismatchError(
      `Unrecognized metrics headers${where}: ${headers.join(', ')} (expected traffic or search export columns)`,
    );
  }
  return schema;
}

/**
 * Keep only the schema's columns, in normalized order
 */
export function normalizeView(view: TabularView, schema: MetricsSchema = requireSchema(view.headers)): TabularView {
  if (!matchesSchema(view.headers, schema)) {
    throw new SchemaMismatchError(
      `Cannot read ${schema.kind} metrics from headers: ${view.headers.join(', ')}`,
    );
  }
  const alreadyNormal =
    view.headers.length === schema.columns.length &&
    schema.columns.every((column, i) => view.headers[i] === column);
  return alreadyNormal ? view : view.select(schema.columns);
}
