import { logger } from '../utils/logger';
import { FetchError, describeError } from '../utils/errors';
import { isValidFollowersCount } from '../models/FollowerSnapshot';

// ═══════════════════════════════════════════════════════════
// Follower Lookup API Service
// One batched UsersByRestIds request per run, no retries
// ═══════════════════════════════════════════════════════════

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FollowerFetcherOptions {
  apiKey: string;
  host: string;
  fetchImpl?: FetchLike;
}

/**
 * Follower counts keyed by account ID
 */
export type FollowerCountsById = Map<string, number>;

export interface FollowerFetcher {
  fetch(accountIds: Iterable<string>): Promise<FollowerCountsById>;
}

export interface UserLookupEntry {
  result?: {
    rest_id?: unknown;
    legacy?: {
      followers_count?: unknown;
    };
  };
}

interface UsersByRestIdsResponse {
  data: {
    users: unknown[];
  };
}

const USERS_BY_REST_IDS_PATH = '/v2/UsersByRestIds/';

export function buildLookupUrl(host: string, accountIds: readonly string[]): string {
  const url = new URL(`https://${host}${USERS_BY_REST_IDS_PATH}`);
  url.searchParams.set('ids', accountIds.join(','));
  return url.toString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isUsersResponse(body: unknown): body is UsersByRestIdsResponse {
  return isRecord(body) && isRecord(body.data) && Array.isArray(body.data.users);
}

/**
 * Pull (id, followers_count) out of one response entry
 * @returns null when the entry is missing either field
 */
export function extractFollowerCount(entry: unknown): { id: string; followersCount: number } | null {
  if (!isRecord(entry) || !isRecord(entry.result)) return null;

  const { rest_id: id, legacy } = entry.result;
  if (typeof id !== 'string' || id === '' || !isRecord(legacy)) return null;

  const followersCount = legacy.followers_count;
  if (!isValidFollowersCount(followersCount)) return null;

  return { id, followersCount };
}

/**
 * Turn a decoded response body into counts by ID
 * Malformed entries are logged and left out
 */
export function parseUsersResponse(body: unknown): FollowerCountsById {
  if (!isUsersResponse(body)) {
    throw new FetchError('Malformed response body: expected data.users array');
  }

  const counts: FollowerCountsById = new Map();

  body.data.users.forEach((entry, index) => {
    const parsed = extractFollowerCount(entry);
    if (!parsed) {
      logger.warn(`Skipping malformed user entry at index ${index}`, { entry });
      return;
    }
    counts.set(parsed.id, parsed.followersCount);
  });

  return counts;
}

function uniqueIds(accountIds: Iterable<string>): string[] {
  return Array.from(new Set(accountIds));
}

// ═══════════════════════════════════════════════════════════
// HTTP fetcher
// ═══════════════════════════════════════════════════════════

export function createFollowerFetcher(options: FollowerFetcherOptions): FollowerFetcher {
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));

  return {
    async fetch(accountIds: Iterable<string>): Promise<FollowerCountsById> {
      const ids = uniqueIds(accountIds);
      if (ids.length === 0) {
        return new Map();
      }

      const url = buildLookupUrl(options.host, ids);
      logger.info(`Fetching follower counts for ${ids.length} accounts from ${options.host}`);

      let response: Response;
      try {
        response = await fetchImpl(url, {
          method: 'GET',
          headers: {
            'Accept': 'application/json',
            'x-rapidapi-key': options.apiKey,
            'x-rapidapi-host': options.host,
          },
        });
      } catch (error) {
        throw new FetchError(`Request to ${options.host} failed: ${describeError(error)}`, { cause: error });
      }

      if (!response.ok) {
        const errorText = await response.text().catch(() => '');
        throw new FetchError(`Follower API error: ${response.status} - ${errorText}`, {
          status: response.status,
        });
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new FetchError('Malformed response body: not valid JSON', { cause: error });
      }

      const counts = parseUsersResponse(body);
      logger.debug(`Received follower counts for ${counts.size} of ${ids.length} accounts`);
      return counts;
    },
  };
}

// ═══════════════════════════════════════════════════════════
// Mock implementation for testing
// ═══════════════════════════════════════════════════════════

export function generateMockCount(): number {
  return Math.floor(Math.random() * 1_000_000) + 1000;
}

export function createMockFollowerFetcher(
  countFor: (accountId: string) => number = generateMockCount
): FollowerFetcher {
  return {
    async fetch(accountIds: Iterable<string>): Promise<FollowerCountsById> {
      const ids = uniqueIds(accountIds);
      logger.info(`[MOCK] Generating follower counts for ${ids.length} accounts`);
      return new Map(ids.map(id => [id, countFor(id)]));
    },
  };
}
