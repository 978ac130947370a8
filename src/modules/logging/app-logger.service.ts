import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
} from './log-levels';

/**
 * Per-request fields stamped onto every entry logged while the request runs.
 */
export interface CorrelationContext {
  /** From the X-Request-Id header, or generated by RequestLoggingInterceptor. */
  requestId: string;
  method?: string;
  path?: string;
  /** Set by BearerAuthGuard once the token is verified. */
  userId?: string;
  startTime?: number;
}

export interface StructuredLogEntry {
  /** ISO-8601 */
  timestamp: string;
  level: string;
  category: string;
  message: string;
  requestId?: string;
  userId?: string;
  method?: string;
  path?: string;
  durationMs?: number;
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
}

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

const SENSITIVE_KEY = /secret|password|token|authorization|bearer|jwt/i;
const REDACTED = '[REDACTED]';

const LEVEL_COLORS: Partial<Record<LogLevel, string>> = {
  [LogLevel.TRACE]: '\x1b[90m',
  [LogLevel.DEBUG]: '\x1b[36m',
  [LogLevel.INFO]: '\x1b[32m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.ERROR]: '\x1b[31m',
  [LogLevel.FATAL]: '\x1b[35m',
};

/**
 * Deep copy with sensitive keys masked at any depth. Cycles become
 * "[Circular]"; dates and bigints become strings.
 */
export function redactSensitive(value: unknown, ancestors: Set<object> = new Set()): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value !== 'object' || value === null) return value;
  if (value instanceof Date) return value.toISOString();
  if (ancestors.has(value)) return '[Circular]';

  ancestors.add(value);
  let copy: unknown;
  if (Array.isArray(value)) {
    copy = value.map((item) => redactSensitive(item, ancestors));
  } else {
    const fields: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      fields[key] = SENSITIVE_KEY.test(key) ? REDACTED : redactSensitive(nested, ancestors);
    }
    copy = fields;
  }
  ancestors.delete(value);
  return copy;
}

/** JSON.stringify that reports a throwing `toJSON` instead of propagating it. */
export function safeStringify(value: unknown, indent?: number): string {
  try {
    return JSON.stringify(value, null, indent) ?? '';
  } catch (error) {
    return `"[unserializable: ${error instanceof Error ? error.message : String(error)}]"`;
  }
}

/**
 * AppLogger: leveled, category-filtered, correlation-aware structured logger.
 *
 * Configuration is read once from the environment (see buildDefaultLogConfig).
 *
 *   this.logger.info(LogCategory.PROVISIONING, 'User provisioned', { userId });
 */
@Injectable()
export class AppLogger {
  private readonly config: LogConfig = buildDefaultLogConfig();

  runWithContext<T>(ctx: CorrelationContext, fn: () => T): T {
    return correlationStorage.run(ctx, fn);
  }

  /** Add fields to the active request context; ignored outside a request. */
  enrichContext(partial: Partial<CorrelationContext>): void {
    const current = correlationStorage.getStore();
    if (current) {
      Object.assign(current, partial);
    }
  }

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>, error?: unknown): void {
    this.log(LogLevel.WARN, category, message, data, error);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, error);
  }

  /** A category override wins over the global level, in either direction. */
  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    const threshold =
      (category !== undefined ? this.config.categoryLevels[category] : undefined) ?? this.config.globalLevel;
    return level !== LogLevel.OFF && level >= threshold;
  }

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown,
  ): void {
    if (!this.isEnabled(level, category)) return;

    const ctx = correlationStorage.getStore();
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
      requestId: ctx?.requestId,
      userId: ctx?.userId,
      method: ctx?.method,
      path: ctx?.path,
    };
    if (ctx?.startTime) entry.durationMs = Date.now() - ctx.startTime;

    const errorInfo = this.describeError(error);
    if (errorInfo) entry.error = errorInfo;
    if (data) entry.data = this.sanitizeData(data);

    if (this.config.format === 'json') {
      const stream = level >= LogLevel.WARN ? process.stderr : process.stdout;
      stream.write(safeStringify(entry) + '\n');
    } else {
      this.writePretty(level, entry);
    }
  }

  private describeError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (error === undefined || error === null) return undefined;
    if (!(error instanceof Error)) return { message: String(error) };
    return this.config.includeStackTraces
      ? { message: error.message, name: error.name, stack: error.stack }
      : { message: error.message, name: error.name };
  }

  /** Redact at every depth first, then cap each top-level value at maxPayloadSizeBytes. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const max = this.config.maxPayloadSizeBytes;
    const result: Record<string, unknown> = {};

    for (const [key, raw] of Object.entries(data)) {
      if (SENSITIVE_KEY.test(key)) {
        result[key] = REDACTED;
        continue;
      }
      const value = redactSensitive(raw);
      if (typeof value === 'string') {
        result[key] = value.length > max ? `${value.slice(0, max)}...[truncated ${value.length - max}B]` : value;
      } else if (typeof value === 'object' && value !== null) {
        const serialized = safeStringify(value);
        result[key] = serialized.length > max ? `${serialized.slice(0, max)}...[truncated]` : value;
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  private writePretty(level: LogLevel, entry: StructuredLogEntry): void {
    const clock = entry.timestamp.slice(11, 23);
    const color = process.stdout.isTTY ? LEVEL_COLORS[level] : undefined;
    const levelLabel = color ? `${color}${entry.level.padEnd(5)}\x1b[0m` : entry.level.padEnd(5);
    const parts = [clock, levelLabel, entry.category.padEnd(12)];
    if (entry.requestId) parts.push(`[${entry.requestId.slice(0, 8)}]`);
    if (entry.method && entry.path) parts.push(`${entry.method} ${entry.path}`);
    if (entry.durationMs !== undefined) parts.push(`+${entry.durationMs}ms`);
    parts.push(entry.message);

    let line = parts.join(' ');
    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack) line += `\n${entry.error.stack}`;
    }
    if (entry.data && Object.keys(entry.data).length > 0) {
      if (level <= LogLevel.DEBUG) {
        line += `\n  ${safeStringify(entry.data, 2).replace(/\n/g, '\n  ')}`;
      } else {
        // Long INFO+ payloads stay in JSON mode only
        const compact = safeStringify(entry.data);
        if (compact.length <= 200) line += ` | ${compact}`;
      }
    }

    /* eslint-disable no-console */
    if (level <= LogLevel.DEBUG) console.debug(line);
    else if (level === LogLevel.INFO) console.log(line);
    else if (level === LogLevel.WARN) console.warn(line);
    else console.error(line);
    /* eslint-enable no-console */
  }
}
