import { truncateForLog, getLogLevels } from './logging.utils';

describe('logging.utils', () => {
  describe('truncateForLog', () => {
    it('should return short values unchanged', () => {
      expect(truncateForLog(['Widget', 5])).toBe('["Widget",5]');
    });

    it('should truncate long values to default length', () => {
      const result = truncateForLog(['a'.repeat(200)]);
      expect(result.length).toBe(103); // 100 chars + '...'
      expect(result.endsWith('...')).toBe(true);
    });

    it('should truncate to custom length', () => {
      expect(truncateForLog('abcdefghij', 4)).toBe('"abc...');
    });

    it('should handle null and undefined', () => {
      expect(truncateForLog(null)).toBe('null');
      expect(truncateForLog(undefined)).toBe('undefined');
    });
  });

  describe('getLogLevels', () => {
    it('should return default log levels', () => {
      expect(getLogLevels()).toEqual(['error', 'warn', 'log']);
    });

    it('should return all levels for verbose', () => {
      expect(getLogLevels('verbose')).toEqual(['error', 'warn', 'log', 'debug', 'verbose']);
    });

    it('should return only error for error level', () => {
      expect(getLogLevels('error')).toEqual(['error']);
    });

    it('should return up to debug for debug level', () => {
      expect(getLogLevels('debug')).toEqual(['error', 'warn', 'log', 'debug']);
    });

    it('should handle invalid log level', () => {
      expect(getLogLevels('invalid')).toEqual(['error', 'warn', 'log']);
    });
  });
});
