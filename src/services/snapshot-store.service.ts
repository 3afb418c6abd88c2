import fs from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import csv from 'csv-parser';
import { logger } from '../utils/logger';
import { StorageCorruptError, RowParseWarning, describeError } from '../utils/errors';
import { buildCsv, formatCsvRow, CSVColumn } from '../utils/csv-export';
import {
  SnapshotRecord,
  SnapshotSet,
  RawSnapshotRow,
  SNAPSHOT_COLUMNS,
  parseSnapshotRow,
  snapshotKey,
  sortSnapshotRecords,
} from '../models/FollowerSnapshot';

// ═══════════════════════════════════════════════════════════
// Snapshot Store - CSV history file
// ═══════════════════════════════════════════════════════════

export interface SnapshotHistory {
  records: SnapshotSet;
  /** Stored rows that are not valid snapshots, written back as they are */
  unparsed: RawSnapshotRow[];
}

export type LoadOutcome =
  | ({ kind: 'found' } & SnapshotHistory)
  | { kind: 'not_found' };

/**
 * Header-keyed row with the file line it starts on
 */
export interface StoredRow {
  line: number;
  row: RawSnapshotRow;
}

interface RecordText {
  line: number;
  text: string;
}

interface ParsedCsv {
  headers: string[];
  rows: StoredRow[];
}

export const SNAPSHOT_CSV_COLUMNS: CSVColumn<SnapshotRecord>[] = [
  { header: 'date', accessor: r => r.date },
  { header: 'username', accessor: r => r.username },
  { header: 'followers_count', accessor: r => r.followersCount },
];

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isBlankRow(row: RawSnapshotRow): boolean {
  return Object.values(row).every(value => !value || !value.trim());
}

/**
 * Read the file, or null if it does not exist
 */
async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw new StorageCorruptError(filePath, `cannot be read (${describeError(error)})`, { cause: error });
  }
}

/**
 * Split content into CSV records, each tagged with the line it starts on
 * Line breaks inside quoted fields stay in their record; empty lines are dropped
 */
function splitRecords(content: string): RecordText[] {
  const records: RecordText[] = [];
  let line = 1;
  let startLine = 1;
  let start = 0;
  let quoted = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    if (char === '"') {
      quoted = !quoted;
    } else if (char === '\n') {
      if (!quoted) {
        records.push({ line: startLine, text: content.slice(start, i) });
        start = i + 1;
        startLine = line + 1;
      }
      line++;
    }
  }
  if (start < content.length) {
    records.push({ line: startLine, text: content.slice(start) });
  }

  return records.filter(record => record.text.replace(/\r$/, '') !== '');
}

function parseCsv(filePath: string, content: string): Promise<ParsedCsv> {
  const records = splitRecords(content);

  return new Promise((resolve, reject) => {
    let headers: string[] = [];
    const rows: StoredRow[] = [];

    Readable.from([records.map(record => `${record.text}\n`).join('')])
      .pipe(csv({ mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim() }))
      .on('headers', (parsed: string[]) => {
        headers = parsed;
      })
      .on('data', (row: RawSnapshotRow) => {
        // records[0] is the header
        const line = records[rows.length + 1]?.line ?? rows.length + 2;
        rows.push({ line, row });
      })
      .on('end', () => resolve({ headers, rows }))
      .on('error', (error: Error) => {
        reject(new StorageCorruptError(filePath, `CSV parse failed (${error.message})`, { cause: error }));
      });
  });
}

function assertSnapshotHeaders(filePath: string, headers: string[]): void {
  const expected = [...SNAPSHOT_COLUMNS].sort();
  const actual = [...headers].sort();
  const matches =
    actual.length === expected.length && actual.every((header, i) => header === expected[i]);

  if (!matches) {
    throw new StorageCorruptError(
      filePath,
      `expected columns ${SNAPSHOT_COLUMNS.join(',')}, found ${headers.join(',') || '(none)'}`
    );
  }
}

/**
 * Read header-keyed rows without validating them
 * @returns rows with their line numbers, or null when the file does not exist
 */
export async function readRawRows(filePath: string): Promise<StoredRow[] | null> {
  const content = await readIfExists(filePath);
  if (content === null) return null;

  if (!content.replace(/^\uFEFF/, '').trim()) {
    logger.warn(`Storage file ${filePath} is empty, treating as no history`);
    return [];
  }

  const { headers, rows } = await parseCsv(filePath, content);
  assertSnapshotHeaders(filePath, headers);

  return rows.filter(({ row }) => !isBlankRow(row));
}

export function logRowWarning(source: string, warning: RowParseWarning): void {
  logger.warn(`Row ${warning.line} of ${source} is not a valid snapshot: ${warning.reason}`, { row: warning.row });
}

/**
 * Load stored history, keeping absence distinct from corruption
 */
export async function readSnapshotFile(filePath: string): Promise<LoadOutcome> {
  const rows = await readRawRows(filePath);
  if (rows === null) {
    return { kind: 'not_found' };
  }

  const byKey = new Map<string, SnapshotRecord>();
  const unparsed: RawSnapshotRow[] = [];

  for (const { line, row } of rows) {
    const parsed = parseSnapshotRow(row);
    if (!parsed.ok) {
      logRowWarning(filePath, { line, reason: parsed.reason, row });
      unparsed.push(row);
      continue;
    }

    const key = snapshotKey(parsed.record.date, parsed.record.username);
    if (byKey.has(key)) {
      logger.warn(`Duplicate row for ${parsed.record.username} on ${parsed.record.date} at line ${line}, keeping the later value`);
    }
    byKey.set(key, parsed.record);
  }

  if (unparsed.length > 0) {
    logger.warn(`${unparsed.length} invalid rows in ${filePath} will be kept as they are`);
  }

  return { kind: 'found', records: Array.from(byKey.values()), unparsed };
}

/**
 * Load stored history; a missing file is an empty history
 */
export async function loadSnapshots(filePath: string): Promise<SnapshotHistory> {
  const outcome = await readSnapshotFile(filePath);

  if (outcome.kind === 'not_found') {
    logger.info(`No history at ${filePath}, starting fresh`);
    return { records: [], unparsed: [] };
  }

  logger.debug(`Loaded ${outcome.records.length} records from ${filePath}`);
  return { records: outcome.records, unparsed: outcome.unparsed };
}

/**
 * Sorted records, then any unparsed rows in their stored order
 */
export function serializeSnapshots(
  records: readonly SnapshotRecord[],
  unparsed: readonly RawSnapshotRow[] = []
): string {
  const kept = unparsed.map(row => `${formatCsvRow(SNAPSHOT_COLUMNS.map(column => row[column]))}\n`);
  return buildCsv(sortSnapshotRecords(records), SNAPSHOT_CSV_COLUMNS) + kept.join('');
}

/**
 * Rewrite the whole history file
 * Written to a sibling temp file first, then renamed over the target
 */
export async function saveSnapshots(
  filePath: string,
  records: readonly SnapshotRecord[],
  unparsed: readonly RawSnapshotRow[] = []
): Promise<void> {
  const content = serializeSnapshots(records, unparsed);
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);

  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }

  logger.debug(`Saved ${records.length + unparsed.length} rows to ${filePath}`);
}
