// src/metrics/metrics.ts
//
// Typed queries over traffic or search exports, either a single parsed view
// or the deduplicated merge of several overlapping exports

import * as fs from 'fs';
import { EmptySourceError, InvalidValueError, SchemaMismatchError, SourceNotFoundError } from './errors.js';
import { mergeViews } from './merge.js';
import { rank, parseCount, type Ranked, type Weight } from './ranking.js';
import {
  normalizeView,
  requireSchema,
  SEARCH_COLUMNS,
  TRAFFIC_COLUMNS,
  type MetricsKind,
  type MetricsSchema,
} from './schema.js';
import { TabularView, type Row } from './table.js';

export interface DateRange {
  start: string;
  end: string;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Leading `YYYY-MM-DD` of a date cell when it names a real calendar day
 */
export function parseDay(value: string): string | null {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12) return null;
  // day 0 of the next month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day < 1 || day > daysInMonth) return null;
  return `${match[1]}-${match[2]}-${match[3]}`;
}

/**
 * Read one export from disk. Any read failure becomes a SourceNotFoundError.
 */
export function readSource(filePath: string): TabularView {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new SourceNotFoundError(filePath, { cause: error });
  }
  return TabularView.parse(content, filePath);
}

export class Metrics {
  readonly view: TabularView;
  readonly schema: MetricsSchema;
  private readonly index: ReadonlyMap<string, number>;

  /**
   * Wrap a single parsed export. Rows are taken as-is (no deduplication).
   */
  constructor(view: TabularView, schema: MetricsSchema = requireSchema(view.headers)) {
    this.schema = schema;
    this.view = normalizeView(view, schema);
    this.index = new Map(this.view.headers.map((name, i): [string, number] => [name, i]));
  }

  /**
   * Parse and merge export files, ordered from oldest to newest snapshot.
   * Fails on the first unreadable path; nothing is merged in that case.
   */
  static build(paths: readonly string[]): Metrics {
    if (paths.length === 0) {
      throw new EmptySourceError();
    }
    return Metrics.merge(paths.map(readSource));
  }

  /**
   * Same as build(), for CSV text already in memory
   */
  static fromCsv(texts: readonly string[]): Metrics {
    if (texts.length === 0) {
      throw new EmptySourceError();
    }
    return Metrics.merge(texts.map((text, i) => TabularView.parse(text, `<csv ${i + 1}>`)));
  }

  static merge(views: readonly TabularView[]): Metrics {
    const { schema, view } = mergeViews(views);
    return new Metrics(view, schema);
  }

  get kind(): MetricsKind {
    return this.schema.kind;
  }

  get headers(): readonly string[] {
    return this.view.headers;
  }

  get length(): number {
    return this.view.length;
  }

  isTraffic(): boolean {
    return this.schema.kind === 'traffic';
  }

  isSearch(): boolean {
    return this.schema.kind === 'search';
  }

  isEmpty(): boolean {
    return this.view.isEmpty();
  }

  rows(): readonly Row[] {
    return this.view.rows();
  }

  toCsv(): string {
    return this.view.toCsv();
  }

  totalViews(): number {
    this.expect('traffic', 'get views');
    const views = this.col(TRAFFIC_COLUMNS.VIEWS);
    let total = 0;
    for (const [i, row] of this.view.rows().entries()) {
      total += parseCount(row[views], TRAFFIC_COLUMNS.VIEWS, i);
    }
    return total;
  }

  mostPopularPages(n?: number): Ranked[] {
    this.expect('traffic', 'get page counts');
    return this.ranked(TRAFFIC_COLUMNS.PATH, this.viewsWeight(), n);
  }

  mostPopularVersions(n?: number): Ranked[] {
    this.expect('traffic', 'get version counts');
    return this.ranked(TRAFFIC_COLUMNS.VERSION, this.viewsWeight(), n);
  }

  /**
   * Each search row is one search; the result count column is not a weight
   */
  mostPopularQueries(n?: number): Ranked[] {
    this.expect('search', 'get query counts');
    return this.ranked(SEARCH_COLUMNS.QUERY, { kind: 'count' }, n);
  }

  /**
   * Earliest and latest calendar day covered, or null when there are no rows
   */
  dateRange(): DateRange | null {
    const dates = this.col(this.schema.date);
    let start: string | null = null;
    let end: string | null = null;
    for (const [i, row] of this.view.rows().entries()) {
      const day = parseDay(row[dates]);
      if (day === null) {
        throw new InvalidValueError(this.schema.date, row[dates], i);
      }
      if (start === null || day < start) start = day;
      if (end === null || day > end) end = day;
    }
    return start !== null && end !== null ? { start, end } : null;
  }

  private ranked(dimension: string, weight: Weight, n: number | undefined): Ranked[] {
    return rank(this.view.rows(), this.col(dimension), weight, n);
  }

  private viewsWeight(): Weight {
    return { kind: 'sum', column: this.col(TRAFFIC_COLUMNS.VIEWS), name: TRAFFIC_COLUMNS.VIEWS };
  }

  private col(name: string): number {
    const position = this.index.get(name);
    // Normalization guarantees schema columns; fall back to the view's own error
    return position ?? this.view.columnIndex(name);
  }

  private expect(kind: MetricsKind, action: string): void {
    if (this.schema.kind !== kind) {
      throw new SchemaMismatchError(`Cannot ${action} on ${this.schema.kind} data`);
    }
  }
}
