// src/metrics/table.ts
//
// Row index or column-name addressable view over parsed CSV text.
// Headers are kept apart from data rows; every cell stays a string.

import Papa from 'papaparse';
import {
  CsvSyntaxError,
  EmptySourceError,
  MalformedRowError,
  UnknownColumnError,
} from './errors.js';

export type Row = readonly string[];

function isBlankRecord(record: string[]): boolean {
  return record.length === 1 && record[0].trim() === '';
}

export class TabularView implements Iterable<Row> {
  private readonly _headers: readonly string[];
  private readonly _rows: readonly Row[];

  private constructor(headers: readonly string[], rows: readonly Row[]) {
    this._headers = Object.freeze([...headers]);
    this._rows = Object.freeze(rows.map(row => Object.freeze([...row])));
  }

  /**
   * Parse comma-delimited CSV text. The first non-blank line is the header.
   * @param source Label used in error messages (usually the file path)
   */
  static parse(text: string, source?: string): TabularView {
    const content = text.startsWith('\uFEFF') ? text.slice(1) : text;
    if (content.trim() === '') {
      throw new EmptySourceError(source ?? '<string>');
    }

    const result = Papa.parse<string[]>(content, { delimiter: ',', skipEmptyLines: false });
    const syntaxError = result.errors.find(error => error.type === 'Quotes');
    if (syntaxError) {
      throw new CsvSyntaxError((syntaxError.row ?? 0) + 1, syntaxError.message, source);
    }

    let headers: string[] | null = null;
    const rows: Row[] = [];
    for (const [index, record] of result.data.entries()) {
      if (isBlankRecord(record)) continue;
      const line = index + 1;
      if (headers === null) {
        assertUniqueHeaders(record, line, source);
        headers = record;
        continue;
      }
      if (record.length !== headers.length) {
        throw new MalformedRowError(line, headers.length, record.length, source);
      }
      rows.push(record);
    }

    if (headers === null) {
      throw new EmptySourceError(source ?? '<string>');
    }
    return new TabularView(headers, rows);
  }

  /**
   * Build a view from in-memory rows (row numbers in errors count the header as line 1)
   */
  static fromRows(headers: readonly string[], rows: Iterable<Row>): TabularView {
    if (headers.length === 0) {
      throw new EmptySourceError('<rows>');
    }
    assertUniqueHeaders(headers, 1);
    const checked: Row[] = [];
    for (const row of rows) {
      if (row.length !== headers.length) {
        throw new MalformedRowError(checked.length + 2, headers.length, row.length);
      }
      checked.push(row);
    }
    return new TabularView(headers, checked);
  }

  get headers(): readonly string[] {
    return this._headers;
  }

  /** Data rows only; the header is not counted */
  get length(): number {
    return this._rows.length;
  }

  isEmpty(): boolean {
    return this._rows.length === 0;
  }

  row(index: number): Row {
    if (!Number.isInteger(index) || index < 0 || index >= this._rows.length) {
      throw new RangeError(`Row index ${index} out of range (0..${this._rows.length - 1})`);
    }
    return this._rows[index];
  }

  rows(): readonly Row[] {
    return this._rows;
  }

  [Symbol.iterator](): Iterator<Row> {
    return this._rows[Symbol.iterator]();
  }

  hasColumn(name: string): boolean {
    return this._headers.includes(name);
  }

  columnIndex(name: string): number {
    const index = this._headers.indexOf(name);
    if (index === -1) {
      throw new UnknownColumnError(name, this._headers);
    }
    return index;
  }

  column(name: string): string[] {
    const index = this.columnIndex(name);
    return this._rows.map(row => row[index]);
  }

  /**
   * Project onto the named columns, in the order given
   */
  select(names: readonly string[]): TabularView {
    const indexes = names.map(name => this.columnIndex(name));
    return new TabularView(names, this._rows.map(row => indexes.map(i => row[i])));
  }

  toCsv(): string {
    return Papa.unparse(
      { fields: [...this._headers], data: this._rows.map(row => [...row]) },
      { newline: '\n' },
    );
  }
}

function assertUniqueHeaders(headers: readonly string[], line: number, source?: string): void {
  const seen = new Set<string>();
  for (const name of headers) {
    if (seen.has(name)) {
      throw new CsvSyntaxError(line, `duplicate column "${name}"`, source);
    }
    seen.add(name);
  }
}
