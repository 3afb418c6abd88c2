import { logger } from '../utils/logger';
import { FetchError, describeError } from '../utils/errors';
import { toIsoDate } from '../utils/date';
import { formatCount, formatDelta } from '../utils/format';
import { AccountDirectory } from '../config/accounts';
import { FollowerFetcher, FollowerCountsById } from './follower-api.service';
import { loadSnapshots, saveSnapshots } from './snapshot-store.service';
import {
  FollowerCountsByUsername,
  mergeSnapshot,
  resolveUsernames,
  findMissingUsernames,
  findPreviousRecord,
} from './merge.service';
import { renderChartFromFile } from './chart.service';

// ═══════════════════════════════════════════════════════════
// Tracker Runner - One daily update
// ═══════════════════════════════════════════════════════════
//
//   load history → fetch counts → resolve usernames
//   → merge today's rows → save → render chart
//
// ═══════════════════════════════════════════════════════════

export interface TrackerDeps {
  fetcher: FollowerFetcher;
  directory: AccountDirectory;
  storagePath: string;
  chartPath: string;
  now?: () => Date;
}

export type TrackerRunResult =
  | {
      status: 'updated';
      date: string;
      counts: FollowerCountsByUsername;
      missing: string[];
      totalRecords: number;
      chartPath: string | null;
    }
  | {
      status: 'fetch_failed';
      error: FetchError;
    };

/**
 * Run one update
 * A fetch failure leaves storage and the chart untouched; storage errors propagate
 * A chart that fails to render is logged, the update still counts
 */
export async function runTracker(deps: TrackerDeps): Promise<TrackerRunResult> {
  const { fetcher, directory, storagePath, chartPath } = deps;
  const now = deps.now ?? (() => new Date());

  const { records: existing, unparsed } = await loadSnapshots(storagePath);

  let countsById: FollowerCountsById;
  try {
    countsById = await fetcher.fetch(directory.ids);
  } catch (error) {
    if (error instanceof FetchError) {
      logger.error(`Failed to fetch data from API: ${error.message}`);
      return { status: 'fetch_failed', error };
    }
    throw error;
  }

  const counts = resolveUsernames(countsById, directory);
  const missing = findMissingUsernames(counts, directory);
  if (missing.length > 0) {
    logger.warn(`No follower count returned for: ${missing.join(', ')}`);
  }

  const today = toIsoDate(now());
  const merged = mergeSnapshot(existing, counts, today);

  for (const [username, followersCount] of counts) {
    const previous = findPreviousRecord(existing, username, today);
    const change = previous
      ? ` (${formatDelta(previous.followersCount, followersCount)} since ${previous.date})`
      : '';
    logger.info(`${username}: ${formatCount(followersCount)} followers${change}`);
  }

  await saveSnapshots(storagePath, merged, unparsed);
  logger.info(`Follower counts updated successfully for ${today}.`);

  let renderedPath: string | null = null;
  try {
    renderedPath = await renderChartFromFile(storagePath, chartPath);
  } catch (error) {
    logger.error(`Failed to render chart to ${chartPath}: ${describeError(error)}`);
  }

  return {
    status: 'updated',
    date: today,
    counts,
    missing,
    totalRecords: merged.length,
    chartPath: renderedPath,
  };
}
