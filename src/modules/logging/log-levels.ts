/**
 * Structured Log Levels — follows RFC 5424 / OpenTelemetry severity conventions.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 * Use cases:
 *   TRACE  — Full request/response bodies, SQL, per-attempt provisioning detail.
 *   DEBUG  — Operational detail: uniqueness checks, token validation, config reads.
 *   INFO   — Significant business events: account created, room opened, user joined.
 *   WARN   — Recoverable anomalies: username race retried, cleanup failed, slow request.
 *   ERROR  — Failed operations requiring attention: provisioning exhausted, DB error.
 *   FATAL  — Threshold only; nothing in the service logs at this level.
 *   OFF    — Suppress all log output.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

/** String → enum mapping (case-insensitive). */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  switch (upper) {
    case 'TRACE': return LogLevel.TRACE;
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'FATAL': return LogLevel.FATAL;
    case 'OFF': return LogLevel.OFF;
  }
  // Numeric fallback
  const num = Number(upper);
  if (Number.isInteger(num) && num >= LogLevel.TRACE && num <= LogLevel.OFF) return num;
  return LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/**
 * Log categories allow filtering by subsystem.
 * Each category maps to a functional area of the server.
 */
export enum LogCategory {
  /** HTTP request/response lifecycle */
  HTTP = 'http',
  /** Authentication & token handling */
  AUTH = 'auth',
  /** Account signup */
  ACCOUNT = 'account',
  /** New-user provisioning workflow */
  PROVISIONING = 'provisioning',
  /** Profile reads & updates */
  PROFILE = 'profile',
  /** Audio rooms & participants */
  AUDIO_ROOM = 'audio-room',
  /** Database / pg operations */
  DATABASE = 'database',
  /** General / uncategorized */
  GENERAL = 'general',
}

const LOG_CATEGORIES: readonly string[] = Object.values(LogCategory);

function isLogCategory(value: string): value is LogCategory {
  return LOG_CATEGORIES.includes(value);
}

/**
 * Log configuration, read from the environment at startup.
 * A global level plus per-category overrides.
 */
export interface LogConfig {
  /** Global minimum log level (default: INFO, can be overridden by LOG_LEVEL env var). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { 'provisioning': LogLevel.TRACE, 'http': LogLevel.WARN }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Include stack traces in ERROR/FATAL output (default: true). */
  includeStackTraces: boolean;

  /** Maximum payload size to log in bytes (default: 8KB). Bodies larger are truncated. */
  maxPayloadSizeBytes: number;

  /** Output format: 'json' for structured (production), 'pretty' for human-readable (dev). */
  format: 'json' | 'pretty';
}

/** Build default log configuration from environment variables. */
export function buildDefaultLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  const isProd = env.NODE_ENV === 'production';
  return {
    globalLevel: parseLogLevel(env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(env.LOG_CATEGORY_LEVELS),
    includeStackTraces: env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd || env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
  };
}

/**
 * Parse LOG_CATEGORY_LEVELS env var.
 * Format: "provisioning=TRACE,auth=WARN,http=DEBUG"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = cat.trim();
      if (isLogCategory(category)) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
