// ═══════════════════════════════════════════════════════════
// Error Types
// ═══════════════════════════════════════════════════════════

export type TrackerErrorCode = 'FETCH_FAILED' | 'STORAGE_CORRUPT' | 'CONFIG_INVALID';

export class TrackerError extends Error {
  readonly code: TrackerErrorCode;

  constructor(code: TrackerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Remote follower lookup failed (network, HTTP status or response body)
 */
export class FetchError extends TrackerError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('FETCH_FAILED', message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/**
 * Stored history exists but cannot be read as snapshot records
 */
export class StorageCorruptError extends TrackerError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('STORAGE_CORRUPT', `Storage file ${filePath} is corrupt: ${message}`, options);
    this.filePath = filePath;
  }
}

export class ConfigError extends TrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options);
  }
}

/**
 * A single skipped row. Logged, never thrown.
 */
export interface RowParseWarning {
  line: number;
  reason: string;
  row: Record<string, string | undefined>;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
