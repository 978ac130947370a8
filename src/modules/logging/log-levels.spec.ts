import {
  LogLevel,
  LogCategory,
  parseLogLevel,
  logLevelName,
  buildDefaultLogConfig,
  parseCategoryLevels,
} from './log-levels';

describe('log-levels', () => {
  // ─── parseLogLevel ────────────────────────────────────────────────

  describe('parseLogLevel', () => {
    it('should return INFO for undefined or empty input', () => {
      expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
      expect(parseLogLevel('')).toBe(LogLevel.INFO);
    });

    it('should parse names case-insensitively', () => {
      expect(parseLogLevel('TRACE')).toBe(LogLevel.TRACE);
      expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel('Warn')).toBe(LogLevel.WARN);
      expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
      expect(parseLogLevel('FATAL')).toBe(LogLevel.FATAL);
      expect(parseLogLevel('off')).toBe(LogLevel.OFF);
    });

    it('should handle leading/trailing whitespace', () => {
      expect(parseLogLevel('  DEBUG  ')).toBe(LogLevel.DEBUG);
    });

    it('should accept numeric string values', () => {
      expect(parseLogLevel('0')).toBe(LogLevel.TRACE);
      expect(parseLogLevel('3')).toBe(LogLevel.WARN);
      expect(parseLogLevel('6')).toBe(LogLevel.OFF);
    });

    it('should return INFO for out-of-range or fractional numbers', () => {
      expect(parseLogLevel('-1')).toBe(LogLevel.INFO);
      expect(parseLogLevel('7')).toBe(LogLevel.INFO);
      expect(parseLogLevel('1.5')).toBe(LogLevel.INFO);
    });

    it('should return INFO for unknown strings', () => {
      expect(parseLogLevel('VERBOSE')).toBe(LogLevel.INFO);
    });
  });

  // ─── logLevelName ─────────────────────────────────────────────────

  describe('logLevelName', () => {
    it('should return the string name for each level', () => {
      expect(logLevelName(LogLevel.TRACE)).toBe('TRACE');
      expect(logLevelName(LogLevel.INFO)).toBe('INFO');
      expect(logLevelName(LogLevel.OFF)).toBe('OFF');
    });

    it('should return UNKNOWN for invalid levels', () => {
      const outOfRange: number = 99;
      expect(logLevelName(outOfRange)).toBe('UNKNOWN');
    });
  });

  // ─── LogCategory ──────────────────────────────────────────────────

  describe('LogCategory', () => {
    it('should expose the expected category values', () => {
      expect(Object.values(LogCategory)).toEqual([
        'http',
        'auth',
        'account',
        'provisioning',
        'profile',
        'audio-room',
        'database',
        'general',
      ]);
    });
  });

  // ─── parseCategoryLevels ──────────────────────────────────────────

  describe('parseCategoryLevels', () => {
    it('should return empty for undefined', () => {
      expect(parseCategoryLevels(undefined)).toEqual({});
    });

    it('should parse known categories and skip unknown ones', () => {
      expect(parseCategoryLevels('provisioning=TRACE, http=warn,bogus=DEBUG,auth')).toEqual({
        [LogCategory.PROVISIONING]: LogLevel.TRACE,
        [LogCategory.HTTP]: LogLevel.WARN,
      });
    });
  });

  // ─── buildDefaultLogConfig ────────────────────────────────────────

  describe('buildDefaultLogConfig', () => {
    it('should use defaults for an empty environment', () => {
      expect(buildDefaultLogConfig({})).toEqual({
        globalLevel: LogLevel.INFO,
        categoryLevels: {},
        includeStackTraces: true,
        maxPayloadSizeBytes: 8192,
        format: 'pretty',
      });
    });

    it('should read overrides from the environment', () => {
      const config = buildDefaultLogConfig({
        LOG_LEVEL: 'debug',
        LOG_FORMAT: 'json',
        LOG_INCLUDE_STACKS: 'false',
        LOG_MAX_PAYLOAD_SIZE: '512',
        LOG_CATEGORY_LEVELS: 'audio-room=ERROR',
      });

      expect(config.globalLevel).toBe(LogLevel.DEBUG);
      expect(config.format).toBe('json');
      expect(config.includeStackTraces).toBe(false);
      expect(config.maxPayloadSizeBytes).toBe(512);
      expect(config.categoryLevels).toEqual({ 'audio-room': LogLevel.ERROR });
    });

    it('should force JSON output in production', () => {
      expect(buildDefaultLogConfig({ NODE_ENV: 'production', LOG_FORMAT: 'pretty' }).format).toBe('json');
    });
  });
});
