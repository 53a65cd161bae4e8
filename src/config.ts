// src/config.ts
//
// Report settings resolution for the docs-metrics CLI
// Priority per setting: CLI flag → env vars → local .env → built-in default

import * as fs from 'fs';
import dotenv from 'dotenv';

export interface ReportSettings {
  dataDir: string;
  outputDir: string;
  top: number;
  strict: boolean;
}

export type SettingSource = 'cli' | 'env' | 'local-env' | 'default';

export interface ResolvedSettings {
  settings: ReportSettings;
  sources: Record<keyof ReportSettings, SettingSource>;
}

/** Raw option values as commander hands them over */
export type CliSettings = {
  dataDir?: string;
  outputDir?: string;
  top?: string;
  strict?: boolean;
};

export const DEFAULT_SETTINGS: ReportSettings = {
  dataDir: 'subproject_csvs',
  outputDir: 'metrics_output',
  top: 25,
  strict: false,
};

const SETTING_KEYS: readonly (keyof ReportSettings)[] = ['dataDir', 'outputDir', 'top', 'strict'];

export const ENV_KEYS: Record<keyof ReportSettings, string> = {
  dataDir: 'METRICS_DATA_DIR',
  outputDir: 'METRICS_OUTPUT_DIR',
  top: 'METRICS_TOP_N',
  strict: 'METRICS_STRICT',
};

/**
 * Load key=value pairs from a .env file, empty when the file is missing
 */
export function loadEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) return {};
  return dotenv.parse(fs.readFileSync(filePath, 'utf-8'));
}

export function parseTop(value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid top count: ${value} (expected a positive integer)`);
  }
  return parsed;
}

export function parseFlag(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function pick(
  key: keyof ReportSettings,
  cliValue: string | undefined,
  env: NodeJS.ProcessEnv,
  localEnv: Record<string, string>,
): { value: string; source: SettingSource } | null {
  if (cliValue !== undefined && cliValue !== '') return { value: cliValue, source: 'cli' };
  const envValue = env[ENV_KEYS[key]];
  if (envValue !== undefined && envValue !== '') return { value: envValue, source: 'env' };
  const fileValue = localEnv[ENV_KEYS[key]];
  if (fileValue !== undefined && fileValue !== '') return { value: fileValue, source: 'local-env' };
  return null;
}

/**
 * Resolve every report setting from its sources
 * @param envFile Local .env consulted after the process environment
 */
export function resolveSettings(
  cli: CliSettings = {},
  env: NodeJS.ProcessEnv = process.env,
  envFile: string = '.env',
): ResolvedSettings {
  const localEnv = loadEnvFile(envFile);

  const dataDir = pick('dataDir', cli.dataDir, env, localEnv);
  const outputDir = pick('outputDir', cli.outputDir, env, localEnv);
  const top = pick('top', cli.top, env, localEnv);
  // --strict only ever switches strict mode on
  const strict = pick('strict', cli.strict ? 'true' : undefined, env, localEnv);

  return {
    settings: {
      dataDir: dataDir?.value ?? DEFAULT_SETTINGS.dataDir,
      outputDir: outputDir?.value ?? DEFAULT_SETTINGS.outputDir,
      top: top ? parseTop(top.value) : DEFAULT_SETTINGS.top,
      strict: strict ? parseFlag(strict.value) : DEFAULT_SETTINGS.strict,
    },
    sources: {
      dataDir: dataDir?.source ?? 'default',
      outputDir: outputDir?.source ?? 'default',
      top: top?.source ?? 'default',
      strict: strict?.source ?? 'default',
    },
  };
}

/**
 * Show resolved settings and where each one came from
 */
export function showSettings(resolved: ResolvedSettings): void {
  const sourceLabels: Record<SettingSource, string> = {
    'cli': 'CLI flag',
    'env': 'Environment variable',
    'local-env': 'Local .env file',
    'default': 'Default',
  };

  console.log('Metrics report settings:\n');
  for (const key of SETTING_KEYS) {
    console.log(`  ${key}: ${resolved.settings[key]}  (${sourceLabels[resolved.sources[key]]}, ${ENV_KEYS[key]})`);
  }
}
