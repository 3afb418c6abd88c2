import fs from 'fs/promises';
import path from 'path';
import ejs from 'ejs';
import { logger } from '../utils/logger';
import { parseSnapshotRow } from '../models/FollowerSnapshot';
import { readRawRows, logRowWarning, StoredRow } from './snapshot-store.service';

// ═══════════════════════════════════════════════════════════
// Chart Service
// Follower counts over time, one line per username
// ═══════════════════════════════════════════════════════════

// Views live in src/server/views - resolve from project root
export const VIEWS_PATH = path.join(__dirname, '..', '..', 'src', 'server', 'views');

export const CHART_TITLE = 'Follower Counts Over Time';

export interface ChartPoint {
  date: string;
  followersCount: number;
}

export interface ChartSeries {
  username: string;
  points: ChartPoint[];
}

export interface ChartDataset {
  label: string;
  data: (number | null)[];
}

export interface ChartData {
  labels: string[];
  datasets: ChartDataset[];
}

/**
 * Group rows by username, each series sorted by date
 * Rows that fail to parse are logged and skipped
 */
export function buildChartSeries(rows: readonly StoredRow[], source: string = 'chart data'): ChartSeries[] {
  const grouped = new Map<string, ChartPoint[]>();

  rows.forEach(({ line, row }) => {
    const parsed = parseSnapshotRow(row);
    if (!parsed.ok) {
      logRowWarning(source, { line, reason: parsed.reason, row });
      return;
    }

    const { date, username, followersCount } = parsed.record;
    const points = grouped.get(username) ?? [];
    points.push({ date, followersCount });
    grouped.set(username, points);
  });

  return Array.from(grouped.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([username, points]) => ({
      username,
      points: points.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0)),
    }));
}

/**
 * Shared date axis with one dataset per username (null where a day is missing)
 */
export function buildChartData(series: readonly ChartSeries[]): ChartData {
  const labels = Array.from(new Set(series.flatMap(s => s.points.map(p => p.date)))).sort();

  const datasets = series.map(s => {
    const byDate = new Map(s.points.map(p => [p.date, p.followersCount]));
    return {
      label: s.username,
      data: labels.map(date => byDate.get(date) ?? null),
    };
  });

  return { labels, datasets };
}

/**
 * JSON for inlining in a <script> block
 */
export function toScriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026');
}

export function chartViewLocals(series: readonly ChartSeries[], generatedAt: Date = new Date()) {
  return {
    title: CHART_TITLE,
    seriesCount: series.length,
    chartData: toScriptJson(buildChartData(series)),
    generatedAt: generatedAt.toISOString(),
  };
}

export async function renderChartHtml(series: readonly ChartSeries[], generatedAt?: Date): Promise<string> {
  return ejs.renderFile(path.join(VIEWS_PATH, 'chart.ejs'), chartViewLocals(series, generatedAt));
}

/**
 * Render the stored history to a standalone HTML chart
 * @returns chart path, or null if there is no history file
 */
export async function renderChartFromFile(storagePath: string, chartPath: string): Promise<string | null> {
  const rows = await readRawRows(storagePath);
  if (rows === null) {
    logger.warn(`CSV file ${storagePath} not found. Cannot plot data.`);
    return null;
  }

  const series = buildChartSeries(rows, storagePath);
  const html = await renderChartHtml(series);

  await fs.mkdir(path.dirname(chartPath), { recursive: true });
  await fs.writeFile(chartPath, html, 'utf-8');

  logger.info(`Chart with ${series.length} series written to ${chartPath}`);
  return chartPath;
}
