import 'dotenv/config';
import { ConfigError } from '../utils/errors';

// ═══════════════════════════════════════════════════════════
// Environment Configuration
// ═══════════════════════════════════════════════════════════
//
// MOCK_FETCH=true  → No API calls, generated follower counts
// SERVE_CHART=true → Keep a local chart server running after the update
//
// ═══════════════════════════════════════════════════════════

type NodeEnv = 'development' | 'production' | 'test';

interface ApiConfig {
  key: string;
  host: string;
}

interface PathConfig {
  accountsFile: string;
  storage: string;
  chart: string;
}

interface EnvConfig {
  // App
  NODE_ENV: NodeEnv;
  LOG_LEVEL: string;

  // Flags
  MOCK_FETCH: boolean;
  SERVE_CHART: boolean;

  // Follower lookup API
  API: ApiConfig;

  // Files
  PATHS: PathConfig;

  // Chart server
  PORT: number;
}

export const DEFAULT_API_HOST = 'twitter135.p.rapidapi.com';
export const DEFAULT_ACCOUNTS_FILE = 'config/accounts.json';
export const DEFAULT_STORAGE_PATH = 'output/followers_counts.csv';
export const DEFAULT_CHART_PATH = 'output/followers_chart.html';

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

// ═══════════════════════════════════════════════════════════
// Helper Functions
// ═══════════════════════════════════════════════════════════

function getEnvVar(key: string, required: boolean = true): string {
  const value = process.env[key];
  if (required && !value) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value ?? '';
}

function getEnvVarAsInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${key} must be an integer, got "${value}"`);
  }
  return parsed;
}

function getEnvVarAsBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some(env => env === value);
}

// ═══════════════════════════════════════════════════════════
// Validate and Build Config
// ═══════════════════════════════════════════════════════════

export function validateEnv(): EnvConfig {
  const nodeEnv = getEnvVar('NODE_ENV', false) || 'development';
  if (!isNodeEnv(nodeEnv)) {
    throw new ConfigError('NODE_ENV must be development, production, or test');
  }

  const mockFetch = getEnvVarAsBool('MOCK_FETCH', false);

  // The key is only needed when we actually call the API
  const apiKey = getEnvVar('RAPIDAPI_KEY', !mockFetch);

  const port = getEnvVarAsInt('PORT', 3000);
  if (port < 1 || port > 65535) {
    throw new ConfigError('PORT must be between 1 and 65535');
  }

  return {
    NODE_ENV: nodeEnv,
    LOG_LEVEL: getEnvVar('LOG_LEVEL', false) || 'info',

    MOCK_FETCH: mockFetch,
    SERVE_CHART: getEnvVarAsBool('SERVE_CHART', false),

    API: {
      key: apiKey,
      host: getEnvVar('RAPIDAPI_HOST', false) || DEFAULT_API_HOST,
    },

    PATHS: {
      accountsFile: getEnvVar('ACCOUNTS_FILE', false) || DEFAULT_ACCOUNTS_FILE,
      storage: getEnvVar('STORAGE_PATH', false) || DEFAULT_STORAGE_PATH,
      chart: getEnvVar('CHART_PATH', false) || DEFAULT_CHART_PATH,
    },

    PORT: port,
  };
}

// ═══════════════════════════════════════════════════════════
// Singleton Config
// ═══════════════════════════════════════════════════════════

let config: EnvConfig | null = null;

export function getConfig(): EnvConfig {
  if (!config) {
    config = validateEnv();
  }
  return config;
}

export function resetConfig(): void {
  config = null;
}

// ═══════════════════════════════════════════════════════════
// Convenience Functions
// ═══════════════════════════════════════════════════════════

export function getModeName(): string {
  return getConfig().MOCK_FETCH ? 'MOCK (No API calls)' : 'LIVE';
}

export type { NodeEnv, ApiConfig, PathConfig, EnvConfig };
