// src/metrics/merge.ts
//
// Combine exports whose rolling date windows overlap. Each export re-reports
// the per-day counts of the previous one, so rows are deduplicated on their
// composite key (date + dimension columns) and the later export's row wins.
// Counts are never summed across exports.

import { EmptySourceError, SchemaMismatchError } from './errors.js';
import { normalizeView, requireSchema, type MetricsSchema } from './schema.js';
import { TabularView, type Row } from './table.js';

export interface MergeResult {
  schema: MetricsSchema;
  view: TabularView;
}

function compositeKey(row: Row, keyIndexes: readonly number[]): string {
  return JSON.stringify(keyIndexes.map(i => row[i]));
}

/**
 * Merge views ordered from oldest to newest export.
 * Output rows keep the position where their key was first seen.
 */
export function mergeViews(views: readonly TabularView[]): MergeResult {
  if (views.length === 0) {
    throw new EmptySourceError();
  }

  const schema = requireSchema(views[0].headers);
  const normalized = views.map((view, i) => {
    const detected = requireSchema(view.headers);
    if (detected.kind !== schema.kind) {
      throw new SchemaMismatchError(
        `Cannot merge disparate data types: source ${i + 1} is ${detected.kind}, expected ${schema.kind}`,
      );
    }
    return normalizeView(view, schema);
  });

  const keyIndexes = schema.key.map(column => schema.columns.indexOf(column));
  const byKey = new Map<string, Row>();
  for (const view of normalized) {
    for (const row of view) {
      // Map.set on an existing key keeps its insertion position
      byKey.set(compositeKey(row, keyIndexes), row);
    }
  }

  return { schema, view: TabularView.fromRows(schema.columns, byKey.values()) };
}
