import { logger } from '../utils/logger';
import { AccountDirectory } from '../config/accounts';
import { FollowerCountsById } from './follower-api.service';
import {
  SnapshotRecord,
  SnapshotSet,
  createSnapshotRecord,
  snapshotKey,
  sortSnapshotRecords,
} from '../models/FollowerSnapshot';

// ═══════════════════════════════════════════════════════════
// Merge Service
// Folds a day's counts into history, one row per (date, username)
// ═══════════════════════════════════════════════════════════

/**
 * Follower counts keyed by username
 */
export type FollowerCountsByUsername = Map<string, number>;

/**
 * Merge today's counts into existing history
 * Existing rows for the same (date, username) are replaced, everything else is kept
 */
export function mergeSnapshot(
  existing: readonly SnapshotRecord[],
  counts: ReadonlyMap<string, number>,
  date: string
): SnapshotSet {
  const index = new Map<string, SnapshotRecord>();

  for (const record of existing) {
    index.set(snapshotKey(record.date, record.username), record);
  }

  for (const [username, followersCount] of counts) {
    index.set(snapshotKey(date, username), createSnapshotRecord(date, username, followersCount));
  }

  return sortSnapshotRecords(Array.from(index.values()));
}

/**
 * Map account IDs from the API back to configured usernames
 * IDs that are not configured are logged and dropped
 */
export function resolveUsernames(
  countsById: FollowerCountsById,
  directory: AccountDirectory
): FollowerCountsByUsername {
  const counts: FollowerCountsByUsername = new Map();

  for (const [id, followersCount] of countsById) {
    const username = directory.getUsername(id);
    if (username === undefined) {
      logger.warn(`Username not found for ID ${id}`);
      continue;
    }
    counts.set(username, followersCount);
  }

  return counts;
}

/**
 * Configured usernames that got no count this run
 */
export function findMissingUsernames(
  counts: ReadonlyMap<string, number>,
  directory: AccountDirectory
): string[] {
  return directory.usernames.filter(username => !counts.has(username));
}

/**
 * Most recent record for a username strictly before the given date
 */
export function findPreviousRecord(
  existing: readonly SnapshotRecord[],
  username: string,
  date: string
): SnapshotRecord | undefined {
  let previous: SnapshotRecord | undefined;
  for (const record of existing) {
    if (record.username !== username || record.date >= date) continue;
    if (!previous || record.date > previous.date) {
      previous = record;
    }
  }
  return previous;
}
