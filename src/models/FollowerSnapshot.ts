import { isValidIsoDate } from '../utils/date';

// ═══════════════════════════════════════════════════════════
// Follower Snapshot Model
// One row per (date, username)
// ═══════════════════════════════════════════════════════════

export interface SnapshotRecord {
  date: string;
  username: string;
  followersCount: number;
}

export type SnapshotSet = SnapshotRecord[];

export const SNAPSHOT_COLUMNS = ['date', 'username', 'followers_count'] as const;

/**
 * Header-keyed CSV row as read from storage
 */
export type RawSnapshotRow = Record<string, string | undefined>;

export type ParseRowResult =
  | { ok: true; record: SnapshotRecord }
  | { ok: false; reason: string };

// ═══════════════════════════════════════════════════════════
// Keys and ordering
// ═══════════════════════════════════════════════════════════

export function snapshotKey(date: string, username: string): string {
  return JSON.stringify([date, username]);
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Storage order: username, then date
 */
export function compareSnapshotRecords(a: SnapshotRecord, b: SnapshotRecord): number {
  return compareStrings(a.username, b.username) || compareStrings(a.date, b.date);
}

export function sortSnapshotRecords(records: readonly SnapshotRecord[]): SnapshotSet {
  return [...records].sort(compareSnapshotRecords);
}

// ═══════════════════════════════════════════════════════════
// Validation
// ═══════════════════════════════════════════════════════════

export function isValidFollowersCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

export function createSnapshotRecord(date: string, username: string, followersCount: number): SnapshotRecord {
  if (!isValidIsoDate(date)) {
    throw new RangeError(`Invalid snapshot date: ${date}`);
  }
  if (!username) {
    throw new RangeError('Snapshot username must not be empty');
  }
  if (!isValidFollowersCount(followersCount)) {
    throw new RangeError(`Invalid followers count for ${username}: ${followersCount}`);
  }
  return { date, username, followersCount };
}

/**
 * Parse one stored row, reporting why it was rejected
 */
export function parseSnapshotRow(row: RawSnapshotRow): ParseRowResult {
  const date = row.date?.trim();
  const username = row.username;
  const countText = row.followers_count?.trim();

  if (!date || !isValidIsoDate(date)) {
    return { ok: false, reason: `invalid date "${row.date ?? ''}"` };
  }
  if (!username) {
    return { ok: false, reason: 'missing username' };
  }
  if (!countText || !/^\d+$/.test(countText)) {
    return { ok: false, reason: `invalid followers_count "${row.followers_count ?? ''}"` };
  }

  const followersCount = Number(countText);
  if (!isValidFollowersCount(followersCount)) {
    return { ok: false, reason: `followers_count out of range "${countText}"` };
  }

  return { ok: true, record: { date, username, followersCount } };
}
