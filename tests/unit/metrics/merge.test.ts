import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Metrics } from '../../../src/metrics/metrics.js';
import { mergeViews } from '../../../src/metrics/merge.js';
import { TabularView } from '../../../src/metrics/table.js';
import {
  EmptySourceError,
  MalformedRowError,
  SchemaMismatchError,
  SourceNotFoundError,
} from '../../../src/metrics/errors.js';
import { captureError } from '../../helpers/capture.js';
import { csv, SEARCH_HEADER, TRAFFIC_HEADER, writeFixture } from '../../helpers/fixtures.js';

function day(n: number): string {
  return `2024-01-${String(n).padStart(2, '0')}`;
}

describe('Metrics.build over overlapping exports', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docs-metrics-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('counts shared rows once', () => {
    // 10 days present in both exports, 5 days unique to each
    const shared = Array.from({ length: 10 }, (_, i) => `${day(i + 1)},latest,/shared,10`);
    const onlyA = Array.from({ length: 5 }, (_, i) => `${day(i + 11)},latest,/a-only,1`);
    const onlyB = Array.from({ length: 5 }, (_, i) => `${day(i + 16)},latest,/b-only,2`);
    const a = writeFixture(tmpDir, 'a.csv', csv(TRAFFIC_HEADER, ...onlyA, ...shared));
    const b = writeFixture(tmpDir, 'b.csv', csv(TRAFFIC_HEADER, ...shared, ...onlyB));

    const merged = Metrics.build([a, b]);
    expect(merged.length).toBe(20);
    expect(merged.totalViews()).toBe(100 + 5 + 10);
    expect(merged.mostPopularPages()).toEqual([
      ['/shared', 100],
      ['/b-only', 10],
      ['/a-only', 5],
    ]);
  });

  it('merging an export with itself changes nothing', () => {
    const f = writeFixture(tmpDir, 'f.csv', csv(
      TRAFFIC_HEADER,
      '2024-01-01,latest,/index.html,7',
      '2024-01-01,stable,/index.html,2',
      '2024-01-02,latest,/api.html,4',
    ));

    const once = Metrics.build([f]);
    const twice = Metrics.build([f, f]);
    expect(twice.rows()).toEqual(once.rows());
    expect(twice.totalViews()).toBe(once.totalViews());
    expect(twice.totalViews()).toBe(13);
    expect(twice.mostPopularPages()).toEqual(once.mostPopularPages());
    expect(twice.mostPopularVersions()).toEqual(once.mostPopularVersions());
  });

  it('lets the later export win when counts differ', () => {
    const older = writeFixture(tmpDir, '2024-01-02.csv', csv(TRAFFIC_HEADER, '2024-01-01,latest,/guide,3'));
    const newer = writeFixture(tmpDir, '2024-01-03.csv', csv(TRAFFIC_HEADER, '2024-01-01,latest,/guide,7'));

    expect(Metrics.build([older, newer]).totalViews()).toBe(7);
    expect(Metrics.build([newer, older]).totalViews()).toBe(3);
  });

  it('keeps the position where a key was first seen', () => {
    const older = writeFixture(tmpDir, 'older.csv', csv(
      TRAFFIC_HEADER,
      '2024-01-01,latest,/a,1',
      '2024-01-01,latest,/b,1',
    ));
    const newer = writeFixture(tmpDir, 'newer.csv', csv(
      TRAFFIC_HEADER,
      '2024-01-02,latest,/c,1',
      '2024-01-01,latest,/a,5',
    ));

    expect(Metrics.build([older, newer]).rows()).toEqual([
      ['2024-01-01', 'latest', '/a', '5'],
      ['2024-01-01', 'latest', '/b', '1'],
      ['2024-01-02', 'latest', '/c', '1'],
    ]);
  });

  it('keeps different versions of the same page apart', () => {
    const f = writeFixture(tmpDir, 'f.csv', csv(
      TRAFFIC_HEADER,
      '2024-01-01,latest,/guide,4',
      '2024-01-01,stable,/guide,6',
    ));
    const merged = Metrics.build([f]);
    expect(merged.length).toBe(2);
    expect(merged.mostPopularPages()).toEqual([['/guide', 10]]);
  });

  it('merges exports whose columns come in different orders', () => {
    const a = writeFixture(tmpDir, 'a.csv', csv(TRAFFIC_HEADER, '2024-01-01,latest,/a,2'));
    const b = writeFixture(tmpDir, 'b.csv', csv('Views,Path,Date,Version,Extra', '2,/a,2024-01-01,latest,x'));

    const merged = Metrics.build([a, b]);
    expect(merged.headers).toEqual(['Date', 'Version', 'Path', 'Views']);
    expect(merged.length).toBe(1);
  });

  it('dedups search rows on created date and query', () => {
    const a = writeFixture(tmpDir, 'a.csv', csv(
      SEARCH_HEADER,
      '2024-01-01 10:00:00,install,12',
      '2024-01-01 10:05:00,install,12',
    ));
    const b = writeFixture(tmpDir, 'b.csv', csv(
      SEARCH_HEADER,
      '2024-01-01 10:05:00,install,14',
      '2024-01-02 08:00:00,api,3',
    ));

    const merged = Metrics.build([a, b]);
    expect(merged.rows()).toEqual([
      ['2024-01-01 10:00:00', 'install', '12'],
      ['2024-01-01 10:05:00', 'install', '14'],
      ['2024-01-02 08:00:00', 'api', '3'],
    ]);
    expect(merged.mostPopularQueries()).toEqual([
      ['install', 2],
      ['api', 1],
    ]);
  });

  it('refuses to merge traffic with search exports', () => {
    const t = writeFixture(tmpDir, 't.csv', csv(TRAFFIC_HEADER, '2024-01-01,latest,/a,2'));
    const s = writeFixture(tmpDir, 's.csv', csv(SEARCH_HEADER, '2024-01-01,install,1'));

    expect(() => Metrics.build([t, s])).toThrow(SchemaMismatchError);
    expect(() => Metrics.build([s, t])).toThrow('Cannot merge disparate data types: source 2 is traffic, expected search');
  });

  it('fails on the first unreadable path', () => {
    const good = writeFixture(tmpDir, 'good.csv', csv(TRAFFIC_HEADER, '2024-01-01,latest,/a,2'));
    const missing1 = path.join(tmpDir, 'missing-1.csv');
    const missing2 = path.join(tmpDir, 'missing-2.csv');

    const error = captureError(() => Metrics.build([good, missing1, missing2]));
    expect(error).toBeInstanceOf(SourceNotFoundError);
    expect(error).toMatchObject({ path: missing1 });
  });

  it('propagates parse errors with the file name', () => {
    const bad = writeFixture(tmpDir, 'bad.csv', csv(TRAFFIC_HEADER, '2024-01-01,latest,/a'));
    const error = captureError(() => Metrics.build([bad]));
    expect(error).toBeInstanceOf(MalformedRowError);
    expect(error).toMatchObject({ line: 2, source: bad });
  });

  it('needs at least one path', () => {
    expect(() => Metrics.build([])).toThrow(EmptySourceError);
  });
});

describe('Metrics.fromCsv', () => {
  it('merges in-memory exports the same way', () => {
    const merged = Metrics.fromCsv([
      csv(TRAFFIC_HEADER, '2024-01-01,latest,/a,1', '2024-01-02,latest,/a,1'),
      csv(TRAFFIC_HEADER, '2024-01-02,latest,/a,3', '2024-01-03,latest,/a,1'),
    ]);
    expect(merged.totalViews()).toBe(5);
    expect(merged.dateRange()).toEqual({ start: '2024-01-01', end: '2024-01-03' });
  });

  it('labels sources by position in errors', () => {
    expect(() => Metrics.fromCsv([csv(TRAFFIC_HEADER), 'Date,Version\n1\n'])).toThrow('<csv 2>: line 2 has 1 fields, expected 2');
  });
});

describe('mergeViews', () => {
  it('returns the schema with the merged view', () => {
    const result = mergeViews([
      TabularView.parse(csv(SEARCH_HEADER, '2024-01-01,a,1')),
      TabularView.parse(csv(SEARCH_HEADER, '2024-01-01,a,1')),
    ]);
    expect(result.schema.kind).toBe('search');
    expect(result.view.length).toBe(1);
  });

  it('needs at least one view', () => {
    expect(() => mergeViews([])).toThrow(EmptySourceError);
  });

  it('rejects unrecognized headers', () => {
    expect(() => mergeViews([TabularView.parse('a,b\n1,2\n')])).toThrow('Unrecognized metrics headers: a, b');
  });
});
