import { parseFormat, parseLimit, resolveLogLevel, MAX_LIMIT } from './cli';

describe('cli', () => {
  describe('parseLimit', () => {
    it('should accept values from 0 to the maximum', () => {
      expect(parseLimit('0', 'max-paths')).toEqual({ success: true, value: 0 });
      expect(parseLimit('10', 'max-paths')).toEqual({ success: true, value: 10 });
      expect(parseLimit(String(MAX_LIMIT), 'max-paths')).toEqual({ success: true, value: 10000 });
    });

    it('should reject values above the maximum', () => {
      expect(parseLimit('10001', 'max-client-ips')).toEqual({
        success: false,
        error: 'Value of 10001 for max-client-ips is not between 0 and 10000',
      });
    });

    it.each(['-1', 'ten', '1.5', ''])('should reject "%s"', input => {
      expect(parseLimit(input, 'max-paths').success).toBe(false);
    });
  });

  describe('parseFormat', () => {
    it('should accept known formats case-insensitively', () => {
      expect(parseFormat('json')).toEqual({ success: true, value: 'json' });
      expect(parseFormat('Markdown')).toEqual({ success: true, value: 'markdown' });
      expect(parseFormat('pretty')).toEqual({ success: true, value: 'pretty' });
    });

    it('should reject unknown formats', () => {
      expect(parseFormat('yaml')).toEqual({
        success: false,
        error: 'Unknown format "yaml" (expected json, markdown, pretty)',
      });
    });
  });

  describe('resolveLogLevel', () => {
    it('should default to info', () => {
      expect(resolveLogLevel(undefined, undefined, 0)).toEqual({ level: 'info', warnings: [] });
    });

    it('should use the environment when no flag is given', () => {
      expect(resolveLogLevel(undefined, 'DEBUG', 0).level).toBe('debug');
      expect(resolveLogLevel(undefined, 'WARN', 0).level).toBe('warn');
      expect(resolveLogLevel(undefined, 'CRITICAL', 0).level).toBe('error');
    });

    it('should prefer the flag over the environment', () => {
      expect(resolveLogLevel('error', 'DEBUG', 0).level).toBe('error');
    });

    it('should let verbosity override flag and environment', () => {
      expect(resolveLogLevel('error', 'ERROR', 1).level).toBe('debug');
      expect(resolveLogLevel('error', 'ERROR', 2).level).toBe('trace');
    });

    it('should warn and fall back to info for an unknown environment value', () => {
      expect(resolveLogLevel(undefined, 'LOUD', 0)).toEqual({
        level: 'info',
        warnings: ['Value "LOUD" in CLFSTATS_LOG_LEVEL is not a valid log level, defaulting to info'],
      });
    });

    it('should warn and fall back to info for an unknown flag value', () => {
      expect(resolveLogLevel('verbose', undefined, 0)).toEqual({
        level: 'info',
        warnings: ['Invalid --log-level "verbose", defaulting to info'],
      });
    });

    it('should ignore an empty environment value', () => {
      expect(resolveLogLevel(undefined, '', 0)).toEqual({ level: 'info', warnings: [] });
    });
  });
});
