import {
  validateEnv,
  getConfig,
  resetConfig,
  getModeName,
  DEFAULT_API_HOST,
  DEFAULT_STORAGE_PATH,
  DEFAULT_CHART_PATH,
  DEFAULT_ACCOUNTS_FILE,
} from '../../src/config/env';
import { ConfigError } from '../../src/utils/errors';

// ═══════════════════════════════════════════════════════════
// Environment Config Tests
// ═══════════════════════════════════════════════════════════

describe('Environment Config', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetConfig();
  });

  describe('validateEnv', () => {
    it('should read the values set for tests', () => {
      const config = validateEnv();

      expect(config.NODE_ENV).toBe('test');
      expect(config.API).toEqual({ key: 'test-api-key', host: 'followers.test.local' });
      expect(config.MOCK_FETCH).toBe(false);
      expect(config.SERVE_CHART).toBe(false);
    });

    it('should use default values for optional vars', () => {
      delete process.env.RAPIDAPI_HOST;
      delete process.env.STORAGE_PATH;
      delete process.env.CHART_PATH;
      delete process.env.ACCOUNTS_FILE;
      delete process.env.PORT;
      delete process.env.LOG_LEVEL;

      const config = validateEnv();

      expect(config.API.host).toBe(DEFAULT_API_HOST);
      expect(config.PATHS).toEqual({
        accountsFile: DEFAULT_ACCOUNTS_FILE,
        storage: DEFAULT_STORAGE_PATH,
        chart: DEFAULT_CHART_PATH,
      });
      expect(config.PORT).toBe(3000);
      expect(config.LOG_LEVEL).toBe('info');
    });

    it('should read file paths from the environment', () => {
      process.env.STORAGE_PATH = 'data/history.csv';
      process.env.CHART_PATH = 'data/chart.html';
      process.env.ACCOUNTS_FILE = 'data/accounts.json';

      const config = validateEnv();

      expect(config.PATHS).toEqual({
        accountsFile: 'data/accounts.json',
        storage: 'data/history.csv',
        chart: 'data/chart.html',
      });
    });

    it('should throw error for missing RAPIDAPI_KEY', () => {
      delete process.env.RAPIDAPI_KEY;

      expect(() => validateEnv()).toThrow('Missing required environment variable: RAPIDAPI_KEY');
    });

    it('should not require RAPIDAPI_KEY in mock mode', () => {
      delete process.env.RAPIDAPI_KEY;
      process.env.MOCK_FETCH = 'true';

      const config = validateEnv();

      expect(config.MOCK_FETCH).toBe(true);
      expect(config.API.key).toBe('');
    });

    it('should throw error for invalid NODE_ENV', () => {
      process.env.NODE_ENV = 'invalid';

      expect(() => validateEnv()).toThrow('NODE_ENV must be development, production, or test');
    });

    it('should throw ConfigError for a non-numeric PORT', () => {
      process.env.PORT = 'abc';

      expect(() => validateEnv()).toThrow(ConfigError);
      expect(() => validateEnv()).toThrow('PORT must be an integer, got "abc"');
    });

    it('should throw ConfigError for an out-of-range PORT', () => {
      process.env.PORT = '70000';

      expect(() => validateEnv()).toThrow('PORT must be between 1 and 65535');
    });

    it('should parse boolean flags case-insensitively', () => {
      process.env.SERVE_CHART = 'TRUE';

      expect(validateEnv().SERVE_CHART).toBe(true);
    });
  });

  describe('getConfig', () => {
    it('should return singleton config instance', () => {
      const config1 = getConfig();
      const config2 = getConfig();

      expect(config1).toBe(config2);
    });

    it('should rebuild config after reset', () => {
      const config1 = getConfig();
      resetConfig();
      const config2 = getConfig();

      expect(config1).not.toBe(config2);
      expect(config1).toEqual(config2);
    });
  });

  describe('getModeName', () => {
    it('should describe live mode', () => {
      expect(getModeName()).toBe('LIVE');
    });

    it('should describe mock mode', () => {
      process.env.MOCK_FETCH = 'true';

      expect(getModeName()).toBe('MOCK (No API calls)');
    });
  });
});
