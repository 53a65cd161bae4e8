// src/report/build-report.ts
//
// Batch metrics build for every subproject under the data directory:
//   <dataDir>/<project>/**/*.csv  →  <outputDir>/<project>/<project>_{traffic,search}.csv
//                                    <outputDir>/summary.json

import * as fs from 'fs';
import * as path from 'path';
import type { ReportSettings } from '../config.js';
import { EmptySourceError, SourceNotFoundError } from '../metrics/errors.js';
import { Metrics, readSource } from '../metrics/metrics.js';
import { requireSchema, type MetricsKind } from '../metrics/schema.js';
import { describeError, findCsvFiles, relativeLink, safeName } from '../utils.js';
import type {
  MetricsSummary,
  ProjectReport,
  ProjectSources,
  ReportSummary,
  SearchReport,
  TrafficReport,
} from './types.js';

export const SUMMARY_FILE = 'summary.json';

export interface ClassifiedSource {
  path: string;
  kind: MetricsKind;
  /** Latest day the export covers; orders exports from oldest to newest */
  latest: string;
}

/**
 * Load one export far enough to know its kind and recency.
 * Empty or unrecognized files and unreadable dates throw.
 */
export function classifySource(filePath: string): ClassifiedSource {
  const view = readSource(filePath);
  const schema = requireSchema(view.headers, filePath);
  const range = new Metrics(view, schema).dateRange();
  if (range === null) {
    throw new EmptySourceError(filePath, 'no data rows');
  }
  return { path: filePath, kind: schema.kind, latest: range.end };
}

/**
 * Oldest export first: by latest covered day, then by path
 */
export function compareRecency(a: ClassifiedSource, b: ClassifiedSource): number {
  if (a.latest !== b.latest) return a.latest < b.latest ? -1 : 1;
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  return 0;
}

/**
 * True when `target` is `dir` itself or somewhere below it
 */
function isWithin(dir: string, target: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(target));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Find every project folder and sort its CSV exports into traffic and search.
 * Bad files are logged and skipped, or rethrown in strict mode.
 */
export function discoverProjects(dataDir: string, strict: boolean = false): ProjectSources[] {
  if (!fs.existsSync(dataDir) || !fs.statSync(dataDir).isDirectory()) {
    throw new SourceNotFoundError(dataDir);
  }

  const projects: ProjectSources[] = [];
  const entries = fs.readdirSync(dataDir).sort();

  for (const entry of entries) {
    const dir = path.join(dataDir, entry);
    console.log(`\n📂 Checking item in data path: ${entry}`);

    if (!fs.statSync(dir).isDirectory()) {
      console.warn(`  ⚠️  Skipped orphan file in data folder: ${dir}`);
      continue;
    }

    const scan = findCsvFiles(dir);
    for (const skipped of scan.skipped) {
      console.warn(`  ⚠️  Skip file: ${path.relative(dataDir, skipped)}`);
    }

    const sources: ClassifiedSource[] = [];
    for (const csvPath of scan.csv) {
      console.log(`  Load CSV: ${path.relative(dataDir, csvPath)}`);
      try {
        const source = classifySource(csvPath);
        sources.push(source);
        console.log(`    ${source.kind === 'traffic' ? 'Traffic' : 'Search'} data found (through ${source.latest})`);
      } catch (error) {
        console.error(`    ❌ Bad CSV ${csvPath}: ${describeError(error)}`);
        if (strict) throw error;
      }
    }

    // Merge order is export recency, not folder or file name order
    sources.sort(compareRecency);
    const project: ProjectSources = {
      name: entry,
      dir,
      traffic: sources.filter(source => source.kind === 'traffic').map(source => source.path),
      search: sources.filter(source => source.kind === 'search').map(source => source.path),
    };

    if (project.traffic.length === 0 && project.search.length === 0) {
      console.warn('  ⚠️  No valid metrics were found for this project');
      continue;
    }
    projects.push(project);
  }

  return projects;
}

function writeMergedCsv(metrics: Metrics, projectDir: string, fileName: string): string {
  const csvPath = path.join(projectDir, fileName);
  fs.writeFileSync(csvPath, `${metrics.toCsv()}\n`, 'utf-8');
  return csvPath;
}

/**
 * Totals and rankings for one merged kind, as printed by `docs-metrics summary`
 */
export function summarizeMetrics(metrics: Metrics, top: number): MetricsSummary {
  if (metrics.isTraffic()) {
    return {
      kind: 'traffic',
      rows: metrics.length,
      dateRange: metrics.dateRange(),
      totalViews: metrics.totalViews(),
      popularPages: metrics.mostPopularPages(top),
      popularVersions: metrics.mostPopularVersions(top),
    };
  }
  return {
    kind: 'search',
    rows: metrics.length,
    dateRange: metrics.dateRange(),
    popularQueries: metrics.mostPopularQueries(top),
  };
}

// Values first, CSV last: a kind that fails to compute writes nothing
function buildTraffic(project: ProjectSources, projectDir: string, settings: ReportSettings): TrafficReport {
  const metrics = Metrics.build(project.traffic);
  const dateRange = metrics.dateRange();
  const totalViews = metrics.totalViews();
  const popularPages = metrics.mostPopularPages(settings.top);
  const popularVersions = metrics.mostPopularVersions(settings.top);

  const csvPath = writeMergedCsv(metrics, projectDir, `${safeName(project.name)}_traffic.csv`);
  console.log(`  ✅ Merged ${project.traffic.length} traffic CSVs (${metrics.length} rows)`);
  return {
    sources: project.traffic,
    rows: metrics.length,
    dateRange,
    totalViews,
    popularPages,
    popularVersions,
    mergedCsv: relativeLink(settings.outputDir, csvPath),
  };
}

function buildSearch(project: ProjectSources, projectDir: string, settings: ReportSettings): SearchReport {
  const metrics = Metrics.build(project.search);
  const dateRange = metrics.dateRange();
  const popularQueries = metrics.mostPopularQueries(settings.top);

  const csvPath = writeMergedCsv(metrics, projectDir, `${safeName(project.name)}_search.csv`);
  console.log(`  ✅ Merged ${project.search.length} search CSVs (${metrics.length} rows)`);
  return {
    sources: project.search,
    rows: metrics.length,
    dateRange,
    popularQueries,
    mergedCsv: relativeLink(settings.outputDir, csvPath),
  };
}

/**
 * Merge and rank one project's exports, writing its merged CSV artifacts.
 * A kind that fails to build is reported as null unless strict mode is on.
 */
export function buildProjectReport(project: ProjectSources, settings: ReportSettings): ProjectReport {
  console.log(`\n📊 Building outputs for: ${project.name}`);
  const projectDir = path.join(settings.outputDir, project.name);
  fs.mkdirSync(projectDir, { recursive: true });

  const report: ProjectReport = { name: project.name, traffic: null, search: null };

  if (project.traffic.length > 0) {
    try {
      report.traffic = buildTraffic(project, projectDir, settings);
    } catch (error) {
      console.error(`  ❌ Error merging/building traffic CSVs for ${project.name}: ${describeError(error)}`);
      if (settings.strict) throw error;
    }
  } else {
    console.warn('  ⚠️  No traffic metrics');
  }

  if (project.search.length > 0) {
    try {
      report.search = buildSearch(project, projectDir, settings);
    } catch (error) {
      console.error(`  ❌ Error merging/building search CSVs for ${project.name}: ${describeError(error)}`);
      if (settings.strict) throw error;
    }
  } else {
    console.warn('  ⚠️  No search metrics');
  }

  return report;
}

/**
 * Rebuild the whole output directory from the data directory.
 * Throws before clearing anything when the output directory contains the data directory.
 */
export function buildReport(settings: ReportSettings, now: () => Date = () => new Date()): ReportSummary {
  if (isWithin(settings.outputDir, settings.dataDir)) {
    throw new Error(
      `Output directory ${settings.outputDir} contains data directory ${settings.dataDir}; choose a separate output folder`,
    );
  }

  const startedAt = now();
  console.log('🚀 Begin metrics build');
  console.log(`   Started at ${startedAt.toISOString()}`);

  if (fs.existsSync(settings.outputDir)) {
    fs.rmSync(settings.outputDir, { recursive: true, force: true });
    console.log('   Old outputs removed');
  }
  fs.mkdirSync(settings.outputDir, { recursive: true });

  const projects = discoverProjects(settings.dataDir, settings.strict);
  const reports = projects.map(project => buildProjectReport(project, settings));

  const summary: ReportSummary = {
    generatedAt: startedAt.toISOString(),
    top: settings.top,
    projects: reports,
  };
  const summaryPath = path.join(settings.outputDir, SUMMARY_FILE);
  fs.writeFileSync(summaryPath, `${JSON.stringify(summary, null, 2)}\n`, 'utf-8');

  console.log(`\n🎉 Metrics build completed: ${reports.length} projects, summary at ${summaryPath}`);
  return summary;
}
