// src/report/types.ts

import type { DateRange } from '../metrics/metrics.js';
import type { Ranked } from '../metrics/ranking.js';

export interface ProjectSources {
  name: string;
  dir: string;
  /** Traffic exports, oldest first */
  traffic: string[];
  /** Search exports, oldest first */
  search: string[];
}

export interface TrafficReport {
  sources: string[];
  rows: number;
  dateRange: DateRange | null;
  totalViews: number;
  popularPages: Ranked[];
  popularVersions: Ranked[];
  /** Merged CSV, relative to the output directory */
  mergedCsv: string;
}

export interface SearchReport {
  sources: string[];
  rows: number;
  dateRange: DateRange | null;
  popularQueries: Ranked[];
  mergedCsv: string;
}

export interface ProjectReport {
  name: string;
  traffic: TrafficReport | null;
  search: SearchReport | null;
}

export interface ReportSummary {
  /** Build time; the report page derives "days since last update" from it */
  generatedAt: string;
  top: number;
  projects: ProjectReport[];
}

export type MetricsSummary =
  | {
      kind: 'traffic';
      rows: number;
      dateRange: DateRange | null;
      totalViews: number;
      popularPages: Ranked[];
      popularVersions: Ranked[];
    }
  | {
      kind: 'search';
      rows: number;
      dateRange: DateRange | null;
      popularQueries: Ranked[];
    };
