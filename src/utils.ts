// src/utils.ts
//
// Shared helpers for the docs-metrics CLI: file discovery, naming, output

import * as fs from 'fs';
import * as path from 'path';

export interface FileScan {
  csv: string[];
  skipped: string[];
}

/**
 * Recursively collect CSV files (case-insensitive extension) under a directory.
 * Entries are visited in code-unit name order, so date-stamped exports come
 * oldest first. Dotfiles are ignored; anything else lands in `skipped`.
 */
export function findCsvFiles(dir: string): FileScan {
  const scan: FileScan = { csv: [], skipped: [] };

  const walk = (current: string): void => {
    const entries = fs.readdirSync(current, { withFileTypes: true })
      .filter(entry => !entry.name.startsWith('.'))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.name.toLowerCase().endsWith('.csv')) {
        scan.csv.push(fullPath);
      } else {
        scan.skipped.push(fullPath);
      }
    }
  };

  walk(dir);
  return scan;
}

/**
 * File-name-safe form of a project name: every non-alphanumeric becomes "_"
 */
export function safeName(name: string): string {
  return name.replace(/[^A-Za-z0-9]/g, '_');
}

/**
 * Forward-slash path of `target` relative to `from`, for links in report output
 */
export function relativeLink(from: string, target: string): string {
  return path.relative(from, target).split(path.sep).join('/');
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print to stdout, or write to a file when a path is given
 */
export function writeOutput(data: unknown, opts: { outputPath?: string } = {}): void {
  const content = typeof data === 'string' ? data : JSON.stringify(data, null, 2);

  if (!opts.outputPath) {
    console.log(content);
    return;
  }

  const outputDir = path.dirname(opts.outputPath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }
  fs.writeFileSync(opts.outputPath, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
  console.log(`Output saved to: ${opts.outputPath}`);
}
