/**
 * Structured Logging for the sandbox service
 *
 * Provides JSON-formatted logs in production and pretty logs in development,
 * plus an in-process metrics collector for session and execution counters.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service?: string;
  component?: string;
  sessionId?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LoggerContext {
  service?: string;
  component?: string;
  sessionId?: string;
  [key: string]: unknown;
}

// =============================================================================
// Configuration
// =============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const isProduction = process.env.NODE_ENV === 'production';
const configuredLevel = process.env.LOG_LEVEL;
const minLevel = isLogLevel(configuredLevel)
  ? LOG_LEVELS[configuredLevel]
  : isProduction ? LOG_LEVELS.info : LOG_LEVELS.debug;
const useJsonFormat = isProduction || process.env.LOG_FORMAT === 'json';

// ANSI color codes for pretty printing
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  blue: '\x1b[34m',
};

const levelColors: Record<LogLevel, string> = {
  debug: colors.dim,
  info: colors.cyan,
  warn: colors.yellow,
  error: colors.red,
  fatal: colors.magenta,
};

// =============================================================================
// Formatters
// =============================================================================

/**
 * Format log entry as JSON for production
 */
function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

/**
 * Format log entry with colors for development
 */
function formatPretty(entry: LogEntry): string {
  const { level, message, timestamp, service, component, sessionId, duration, ...rest } = entry;

  const color = levelColors[level];
  const time = new Date(timestamp).toLocaleTimeString();

  let output = `${colors.dim}${time}${colors.reset} ${color}[${level.toUpperCase()}]${colors.reset}`;

  if (service) {
    output += ` ${colors.blue}[${component ? `${service}:${component}` : service}]${colors.reset}`;
  }

  output += ` ${message}`;

  if (sessionId) {
    output += ` ${colors.dim}session=${sessionId}${colors.reset}`;
  }

  if (duration !== undefined) {
    output += ` ${colors.dim}(${duration}ms)${colors.reset}`;
  }

  const extras = Object.entries(rest).filter(([, v]) => v !== undefined);
  if (extras.length > 0) {
    const extraStr = extras.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(' ');
    output += ` ${colors.dim}${extraStr}${colors.reset}`;
  }

  return output;
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private context: LoggerContext;

  constructor(context: LoggerContext = {}) {
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LoggerContext): Logger {
    return new Logger({ ...this.context, ...context });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < minLevel) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...meta,
    };

    const formatted = useJsonFormat ? formatJson(entry) : formatPretty(entry);

    switch (level) {
      case 'error':
      case 'fatal':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log('fatal', message, meta);
  }

  /**
   * Create a timer that logs on completion
   */
  startTimer(message: string, meta?: Record<string, unknown>): { end: (extra?: Record<string, unknown>) => number } {
    const start = Date.now();
    return {
      end: (extra) => {
        const duration = Date.now() - start;
        this.info(message, { ...meta, ...extra, duration });
        return duration;
      },
    };
  }
}

/**
 * Flatten an unknown thrown value into loggable fields
 */
export function errorFields(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}

// =============================================================================
// Default Logger Instance
// =============================================================================

export const logger = new Logger({ service: 'sandbox' });

// =============================================================================
// Metrics Collection
// =============================================================================

export interface MetricValue {
  count: number;
  sum: number;
  min: number;
  max: number;
  lastValue: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  histograms: Record<string, MetricValue & { avg: number }>;
}

export class Metrics {
  private counters = new Map<string, number>();
  private gauges = new Map<string, number>();
  private histograms = new Map<string, MetricValue>();

  /**
   * Increment a counter
   */
  inc(name: string, value = 1, labels?: Record<string, string>): void {
    const key = this.formatKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  /**
   * Set a gauge value
   */
  set(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.formatKey(name, labels);
    this.gauges.set(key, value);
  }

  /**
   * Record a value in a histogram
   */
  observe(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.formatKey(name, labels);
    const existing = this.histograms.get(key);

    if (existing) {
      existing.count++;
      existing.sum += value;
      existing.min = Math.min(existing.min, value);
      existing.max = Math.max(existing.max, value);
      existing.lastValue = value;
    } else {
      this.histograms.set(key, {
        count: 1,
        sum: value,
        min: value,
        max: value,
        lastValue: value,
      });
    }
  }

  /**
   * Get all metrics as a snapshot
   */
  getSnapshot(): MetricsSnapshot {
    const histograms: Record<string, MetricValue & { avg: number }> = {};

    for (const [key, value] of this.histograms) {
      histograms[key] = {
        ...value,
        avg: value.sum / value.count,
      };
    }

    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms,
    };
  }

  /**
   * Reset all metrics
   */
  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }

  private formatKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(',');
    return `${name}{${labelStr}}`;
  }
}

export const metrics = new Metrics();

export default logger;
