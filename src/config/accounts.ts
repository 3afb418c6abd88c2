import fs from 'fs/promises';
import { ConfigError, describeError } from '../utils/errors';

// ═══════════════════════════════════════════════════════════
// Tracked Accounts
// Static username → account ID mapping, resolved both ways
// ═══════════════════════════════════════════════════════════

export interface TrackedAccount {
  username: string;
  id: string;
}

export interface AccountDirectory {
  readonly accounts: readonly TrackedAccount[];
  readonly ids: readonly string[];
  readonly usernames: readonly string[];
  getUsername(id: string): string | undefined;
  getId(username: string): string | undefined;
}

const ACCOUNT_ID_PATTERN = /^\d+$/;

/**
 * Build the lookup tables once from the configured accounts
 */
export function createAccountDirectory(accounts: readonly TrackedAccount[]): AccountDirectory {
  if (accounts.length === 0) {
    throw new ConfigError('At least one tracked account must be configured');
  }

  const byId = new Map<string, string>();
  const byUsername = new Map<string, string>();

  for (const { username, id } of accounts) {
    if (!username.trim()) {
      throw new ConfigError('Tracked account username must not be empty');
    }
    if (!ACCOUNT_ID_PATTERN.test(id)) {
      throw new ConfigError(`Account ID for ${username} must be numeric, got "${id}"`);
    }
    if (byUsername.has(username)) {
      throw new ConfigError(`Duplicate tracked username: ${username}`);
    }
    const owner = byId.get(id);
    if (owner !== undefined) {
      throw new ConfigError(`Account ID ${id} is configured for both ${owner} and ${username}`);
    }

    byId.set(id, username);
    byUsername.set(username, id);
  }

  const frozen = accounts.map(a => ({ username: a.username, id: a.id }));

  return {
    accounts: frozen,
    ids: frozen.map(a => a.id),
    usernames: frozen.map(a => a.username),
    getUsername: (id) => byId.get(id),
    getId: (username) => byUsername.get(username),
  };
}

/**
 * Parse a `{ "<username>": "<id>" }` object
 */
export function parseAccounts(raw: unknown): TrackedAccount[] {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Accounts config must be an object mapping username to account ID');
  }

  return Object.entries(raw).map(([username, id]) => {
    if (typeof id !== 'string') {
      throw new ConfigError(`Account ID for ${username} must be a string`);
    }
    return { username, id: id.trim() };
  });
}

export async function loadAccounts(filePath: string): Promise<AccountDirectory> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read accounts file ${filePath}: ${describeError(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Accounts file ${filePath} is not valid JSON`, { cause: error });
  }

  return createAccountDirectory(parseAccounts(raw));
}
