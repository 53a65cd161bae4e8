// src/metrics/ranking.ts
//
// Group-and-rank used by every "most popular" query

import { InvalidValueError } from './errors.js';
import type { Row } from './table.js';

/** [label, total] pair, ready to feed a bar chart */
export type Ranked = [label: string, count: number];

export type Weight =
  | { kind: 'sum'; column: number; name: string }
  | { kind: 'count' };

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a count cell as a base-10 integer
 * @param row Zero-based data row, reported in errors
 */
export function parseCount(value: string, column: string, row: number): number {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new InvalidValueError(column, value, row);
  }
  return parseInt(trimmed, 10);
}

export function compareRanked(a: Ranked, b: Ranked): number {
  if (a[1] !== b[1]) return b[1] - a[1];
  if (a[0] < b[0]) return -1;
  if (a[0] > b[0]) return 1;
  return 0;
}

/**
 * Total each distinct value of the dimension column and rank the totals:
 * highest first, ties by ascending label. Omitting `limit` returns every group.
 */
export function rank(rows: Iterable<Row>, dimension: number, weight: Weight, limit?: number): Ranked[] {
  if (limit !== undefined && limit <= 0) return [];

  const totals = new Map<string, number>();
  let index = 0;
  for (const row of rows) {
    const amount = weight.kind === 'sum' ? parseCount(row[weight.column], weight.name, index) : 1;
    const label = row[dimension];
    totals.set(label, (totals.get(label) ?? 0) + amount);
    index++;
  }

  const ranked = [...totals.entries()].sort(compareRanked);
  return limit === undefined ? ranked : ranked.slice(0, Math.floor(limit));
}
