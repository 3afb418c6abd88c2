import fs from 'fs/promises';
import path from 'path';
import { createTempDir } from '../setup';
import {
  createAccountDirectory,
  parseAccounts,
  loadAccounts,
} from '../../src/config/accounts';
import { ConfigError } from '../../src/utils/errors';

// ═══════════════════════════════════════════════════════════
// Tracked Accounts Tests
// ═══════════════════════════════════════════════════════════

describe('Tracked Accounts', () => {
  describe('createAccountDirectory', () => {
    const directory = createAccountDirectory([
      { username: 'alice', id: '1001' },
      { username: 'bob', id: '1002' },
    ]);

    it('should resolve IDs to usernames', () => {
      expect(directory.getUsername('1001')).toBe('alice');
      expect(directory.getUsername('1002')).toBe('bob');
      expect(directory.getUsername('9999')).toBeUndefined();
    });

    it('should resolve usernames to IDs', () => {
      expect(directory.getId('alice')).toBe('1001');
      expect(directory.getId('carol')).toBeUndefined();
    });

    it('should keep configured order', () => {
      expect(directory.ids).toEqual(['1001', '1002']);
      expect(directory.usernames).toEqual(['alice', 'bob']);
    });

    it('should reject an empty configuration', () => {
      expect(() => createAccountDirectory([])).toThrow('At least one tracked account must be configured');
    });

    it('should reject duplicate IDs', () => {
      expect(() =>
        createAccountDirectory([
          { username: 'alice', id: '1001' },
          { username: 'alias', id: '1001' },
        ])
      ).toThrow('Account ID 1001 is configured for both alice and alias');
    });

    it('should reject duplicate usernames', () => {
      expect(() =>
        createAccountDirectory([
          { username: 'alice', id: '1001' },
          { username: 'alice', id: '1002' },
        ])
      ).toThrow('Duplicate tracked username: alice');
    });

    it('should reject non-numeric IDs', () => {
      expect(() => createAccountDirectory([{ username: 'alice', id: 'abc' }])).toThrow(ConfigError);
    });

    it('should reject blank usernames', () => {
      expect(() => createAccountDirectory([{ username: '  ', id: '1' }])).toThrow(
        'Tracked account username must not be empty'
      );
    });
  });

  describe('parseAccounts', () => {
    it('should turn an object into accounts', () => {
      expect(parseAccounts({ alice: '1001', bob: ' 1002 ' })).toEqual([
        { username: 'alice', id: '1001' },
        { username: 'bob', id: '1002' },
      ]);
    });

    it('should reject arrays and primitives', () => {
      expect(() => parseAccounts(['1001'])).toThrow(ConfigError);
      expect(() => parseAccounts('alice')).toThrow(ConfigError);
      expect(() => parseAccounts(null)).toThrow(ConfigError);
    });

    it('should reject numeric IDs', () => {
      expect(() => parseAccounts({ alice: 1001 })).toThrow('Account ID for alice must be a string');
    });
  });

  describe('loadAccounts', () => {
    it('should load the shipped accounts file', async () => {
      const directory = await loadAccounts(path.join(__dirname, '..', '..', 'config', 'accounts.json'));

      expect(directory.usernames).toEqual(['elonmusk', 'Tesla', 'Cobratate', 'nvidia']);
      expect(directory.getUsername('44196397')).toBe('elonmusk');
    });

    it('should fail with ConfigError for a missing file', async () => {
      const dir = await createTempDir();
      await expect(loadAccounts(path.join(dir, 'missing.json'))).rejects.toThrow(ConfigError);
    });

    it('should fail with ConfigError for invalid JSON', async () => {
      const dir = await createTempDir();
      const file = path.join(dir, 'accounts.json');
      await fs.writeFile(file, '{ not json');

      await expect(loadAccounts(file)).rejects.toThrow(`Accounts file ${file} is not valid JSON`);
    });
  });
});
