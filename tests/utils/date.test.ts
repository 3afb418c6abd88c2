import { toIsoDate, isValidIsoDate } from '../../src/utils/date';

// ═══════════════════════════════════════════════════════════
// Date Utility Tests
// ═══════════════════════════════════════════════════════════

describe('Date Utilities', () => {
  describe('toIsoDate', () => {
    it('should format the local calendar day', () => {
      expect(toIsoDate(new Date(2024, 0, 1, 23, 59))).toBe('2024-01-01');
    });

    it('should zero-pad month and day', () => {
      expect(toIsoDate(new Date(2024, 8, 5, 12))).toBe('2024-09-05');
    });

    it('should use current date if not provided', () => {
      expect(toIsoDate()).toMatch(/^\d{4}-\d{2}-\d{2}$/);
    });
  });

  describe('isValidIsoDate', () => {
    it('should accept real calendar dates', () => {
      expect(isValidIsoDate('2024-01-01')).toBe(true);
      expect(isValidIsoDate('2024-02-29')).toBe(true);
      expect(isValidIsoDate('2023-12-31')).toBe(true);
    });

    it('should reject impossible dates', () => {
      expect(isValidIsoDate('2023-02-29')).toBe(false);
      expect(isValidIsoDate('2024-04-31')).toBe(false);
      expect(isValidIsoDate('2024-13-01')).toBe(false);
      expect(isValidIsoDate('2024-00-10')).toBe(false);
    });

    it('should reject other formats', () => {
      expect(isValidIsoDate('2024-1-1')).toBe(false);
      expect(isValidIsoDate('01/02/2024')).toBe(false);
      expect(isValidIsoDate('2024-01-01T00:00:00Z')).toBe(false);
      expect(isValidIsoDate(' 2024-01-01')).toBe(false);
      expect(isValidIsoDate('')).toBe(false);
    });
  });
});
