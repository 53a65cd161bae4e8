#!/usr/bin/env node

// src/cli.ts
//
// CLI entry point for docs-metrics
// Usage: docs-metrics build | docs-metrics summary <files...> | docs-metrics merge <files...>

import { Command } from 'commander';
import { resolveSettings, showSettings, type CliSettings, type ResolvedSettings } from './config.js';
import { Metrics } from './metrics/metrics.js';
import { buildReport, summarizeMetrics } from './report/build-report.js';
import { writeOutput } from './utils.js';

const program = new Command();

program
  .name('docs-metrics')
  .description('Merge overlapping documentation analytics exports and rank pages, versions and search queries')
  .version('1.0.0')
  .option('-d, --data-dir <dir>', 'Folder holding one subfolder of CSV exports per project')
  .option('-o, --output-dir <dir>', 'Folder the report is written to (cleared on build)')
  .option('-n, --top <n>', 'Number of entries in each ranking')
  .option('--strict', 'Fail on invalid data instead of skipping it');

/**
 * Settings for a run, from the global options plus env / .env fallbacks
 */
function settingsFor(command: Command): ResolvedSettings {
  const opts = command.optsWithGlobals<CliSettings>();
  return resolveSettings(opts);
}

// --- build command: whole report ---
program
  .command('build')
  .description('Build merged CSVs and summary.json for every project in the data folder')
  .action((_options: unknown, command: Command) => {
    const { settings } = settingsFor(command);
    buildReport(settings);
  });

// --- summary command: rankings for explicit files ---
program
  .command('summary <files...>')
  .description('Merge the given exports (oldest first) and print totals and rankings as JSON')
  .action((files: string[], _options: unknown, command: Command) => {
    const { settings } = settingsFor(command);
    const metrics = Metrics.build(files);

    writeOutput(summarizeMetrics(metrics, settings.top));
  });

// --- merge command: deduplicated CSV artifact ---
program
  .command('merge <files...>')
  .description('Merge the given exports (oldest first) into one deduplicated CSV')
  .option('-f, --file <path>', 'Write the merged CSV here instead of stdout')
  .action((files: string[], cmdOpts: { file?: string }) => {
    const metrics = Metrics.build(files);
    writeOutput(metrics.toCsv(), { outputPath: cmdOpts.file });
  });

// --- config command ---
program
  .command('config')
  .description('Show resolved settings and where each one came from')
  .action((_options: unknown, command: Command) => {
    showSettings(settingsFor(command));
  });

// Parse and execute
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
