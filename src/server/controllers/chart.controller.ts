import { Request, Response } from 'express';
import {
  SnapshotRecord,
  parseSnapshotRow,
  sortSnapshotRecords,
} from '../../models/FollowerSnapshot';
import { readRawRows, StoredRow, SNAPSHOT_CSV_COLUMNS } from '../../services/snapshot-store.service';
import { buildChartSeries, chartViewLocals } from '../../services/chart.service';
import { sendCsv } from '../../utils/csv-export';

// ═══════════════════════════════════════════════════════════
// Chart Controller
// Chart page, series API and CSV export for the history file
// ═══════════════════════════════════════════════════════════

function getStoragePath(req: Request): string {
  const storagePath: unknown = req.app.locals.storagePath;
  if (typeof storagePath !== 'string') {
    throw new Error('storagePath is not configured on the app');
  }
  return storagePath;
}

async function readRows(req: Request): Promise<StoredRow[] | null> {
  return readRawRows(getStoragePath(req));
}

/**
 * Interactive chart page
 */
export async function chartPage(req: Request, res: Response): Promise<void> {
  const rows = await readRows(req);

  if (rows === null) {
    res.status(404).send('No follower data recorded yet');
    return;
  }

  res.render('chart', chartViewLocals(buildChartSeries(rows, getStoragePath(req))));
}

/**
 * Series JSON
 */
export async function followersApi(req: Request, res: Response): Promise<void> {
  const rows = await readRows(req);
  const series = rows === null ? [] : buildChartSeries(rows, getStoragePath(req));
  res.json({ series });
}

/**
 * Download the valid history rows as CSV
 */
export async function exportFollowersCsv(req: Request, res: Response): Promise<void> {
  const rows = await readRows(req);

  const records: SnapshotRecord[] = [];
  for (const { row } of rows ?? []) {
    const parsed = parseSnapshotRow(row);
    if (parsed.ok) records.push(parsed.record);
  }

  sendCsv(res, 'followers_counts.csv', sortSnapshotRecords(records), SNAPSHOT_CSV_COLUMNS);
}

export function health(_req: Request, res: Response): void {
  res.status(200).json({ status: 'healthy', timestamp: new Date().toISOString() });
}
