import { parseCorsOrigins, resolveLogLevels } from './app.config';

describe('app config', () => {
  describe('resolveLogLevels', () => {
    it('should enable log and above by default', () => {
      expect(resolveLogLevels(undefined)).toEqual([
        'log',
        'warn',
        'error',
        'fatal',
      ]);
    });

    it('should enable the named level and everything above it', () => {
      expect(resolveLogLevels('debug')).toEqual([
        'debug',
        'log',
        'warn',
        'error',
        'fatal',
      ]);
    });

    it('should ignore case and surrounding whitespace', () => {
      expect(resolveLogLevels(' WARN ')).toEqual(['warn', 'error', 'fatal']);
    });

    it('should fall back to log for an unknown level', () => {
      expect(resolveLogLevels('chatty')).toEqual([
        'log',
        'warn',
        'error',
        'fatal',
      ]);
    });
  });

  describe('parseCorsOrigins', () => {
    it('should split and trim a comma-separated list', () => {
      expect(parseCorsOrigins(' http://a.test , ,http://b.test')).toEqual([
        'http://a.test',
        'http://b.test',
      ]);
    });

    it('should return no origins when unset', () => {
      expect(parseCorsOrigins(undefined)).toEqual([]);
    });
  });
});
