import { Writable } from 'stream';
import winston from 'winston';
import { logger } from '../../src/utils/logger';

// ═══════════════════════════════════════════════════════════
// Logger Tests
// ═══════════════════════════════════════════════════════════

describe('Logger', () => {
  describe('logger instance', () => {
    it('should be defined', () => {
      expect(logger).toBeDefined();
    });

    it('should expose the standard level methods', () => {
      expect(typeof logger.info).toBe('function');
      expect(typeof logger.warn).toBe('function');
      expect(typeof logger.error).toBe('function');
      expect(typeof logger.debug).toBe('function');
    });
  });

  describe('logging methods', () => {
    it('should log with metadata without throwing', () => {
      expect(() => logger.warn('Skipping row', { row: { date: 'bad' } })).not.toThrow();
    });

    it('should log error with stack trace', () => {
      const error = new Error('Test error');
      expect(() => logger.error('Error occurred', error)).not.toThrow();
    });
  });

  describe('message interpolation', () => {
    it('should keep percent tokens in the message and the metadata intact', async () => {
      const logged: Record<string, unknown>[] = [];
      const stream = new Writable({
        objectMode: true,
        write(chunk: Record<string, unknown>, _encoding, callback) {
          logged.push(chunk);
          callback();
        },
      });
      const transport = new winston.transports.Stream({ stream });
      logger.add(transport);

      logger.warn('Row 3 of data.csv is not a valid snapshot: invalid date "5%s"', { row: { date: '5%s' } });
      await new Promise(resolve => setImmediate(resolve));
      logger.remove(transport);

      expect(logged).toHaveLength(1);
      expect(logged[0]).toMatchObject({
        message: 'Row 3 of data.csv is not a valid snapshot: invalid date "5%s"',
        row: { date: '5%s' },
      });
    });
  });

  describe('transports', () => {
    it('should be silent in test mode', () => {
      expect(logger.transports.length).toBe(1);
      expect(logger.transports[0]!.silent).toBe(true);
    });
  });

  describe('default meta', () => {
    it('should have service name in default meta', () => {
      expect(logger.defaultMeta).toEqual({ service: 'follower-tracker' });
    });
  });
});
