// src/metrics/errors.ts
//
// Error taxonomy for CSV ingestion and metrics queries

export class MetricsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Source had no header line, no data where data is required, or no sources were given
 */
export class EmptySourceError extends MetricsError {
  constructor(
    public readonly source?: string,
    detail: string = 'no headers',
  ) {
    super(source ? `Empty CSV with ${detail}: ${source}` : 'Must provide at least one data source');
  }
}

/**
 * A record's field count does not match the header
 */
export class MalformedRowError extends MetricsError {
  constructor(
    public readonly line: number,
    public readonly expected: number,
    public readonly actual: number,
    public readonly source?: string,
  ) {
    super(`${source ? `${source}: ` : ''}line ${line} has ${actual} fields, expected ${expected}`);
  }
}

/**
 * Quoting problem reported by the CSV parser
 */
export class CsvSyntaxError extends MetricsError {
  constructor(
    public readonly line: number,
    public readonly reason: string,
    public readonly source?: string,
  ) {
    super(`${source ? `${source}: ` : ''}line ${line}: ${reason}`);
  }
}

export class UnknownColumnError extends MetricsError {
  constructor(
    public readonly column: string,
    public readonly available: readonly string[],
  ) {
    super(`Unknown column "${column}" (known: ${available.join(', ')})`);
  }
}

/**
 * Headers match no known export, sources of different kinds were merged,
 * or a query was run against the wrong kind of data
 */
export class SchemaMismatchError extends MetricsError {}

export class SourceNotFoundError extends MetricsError {
  constructor(
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(`Cannot read metrics source: ${path}`, options);
  }
}

/**
 * A count or date cell that cannot be interpreted
 */
export class InvalidValueError extends MetricsError {
  constructor(
    public readonly column: string,
    public readonly value: string,
    public readonly row: number,
  ) {
    super(`Invalid ${column} value "${value}" in row ${row}`);
  }
}
