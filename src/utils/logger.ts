/**
 * Structured Logging for the remote helper
 *
 * stdout carries the protocol, so every log line goes to stderr. Lines are
 * pretty by default and JSON when LOG_FORMAT=json. The threshold follows the
 * verbosity git negotiates for the session.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'pretty' | 'json';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LoggerContext {
  service?: string;
  [key: string]: unknown;
}

/**
 * Anything log lines can be written to (process.stderr, a test buffer)
 */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  sink?: LogSink;
  colors?: boolean;
}

// =============================================================================
// Configuration
// =============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ANSI color codes for pretty printing
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

const levelColors: Record<LogLevel, string> = {
  debug: colors.dim,
  info: colors.cyan,
  warn: colors.yellow,
  error: colors.red,
};

/**
 * Map git's verbosity (0 = quiet, 1 = default, 2+ = verbose) to a threshold
 */
export function levelForVerbosity(verbosity: number): LogLevel {
  if (verbosity <= 0) return 'error';
  if (verbosity === 1) return 'info';
  return 'debug';
}

// =============================================================================
// Formatters
// =============================================================================

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

/**
 * Format a log entry the way git prints helper diagnostics: "info: message"
 */
function formatPretty(entry: LogEntry, useColors: boolean): string {
  const { level, message, timestamp: _timestamp, service: _service, duration, ...rest } = entry;

  const color = useColors ? levelColors[level] : '';
  const dim = useColors ? colors.dim : '';
  const reset = useColors ? colors.reset : '';

  let output = `${color}${level}${reset}: ${message}`;

  if (duration !== undefined) {
    output += ` ${dim}(${duration}ms)${reset}`;
  }

  const extras = Object.entries(rest).filter(([_, v]) => v !== undefined);
  if (extras.length > 0) {
    const extraStr = extras.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(' ');
    output += ` ${dim}${extraStr}${reset}`;
  }

  return output;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Settings shared by a logger and all of its children
 */
interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  sink: LogSink;
  colors: boolean;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly settings: LoggerSettings;

  constructor(context: LoggerContext = {}, options: LoggerOptions = {}, shared?: LoggerSettings) {
    this.context = context;
    this.settings = shared ?? {
      level: options.level ?? 'info',
      format: options.format ?? 'pretty',
      sink: options.sink ?? process.stderr,
      colors: options.colors ?? false,
    };
  }

  /**
   * Create a child logger with additional context
   * The child shares its parent's level, so a verbosity change applies to both.
   */
  child(context: LoggerContext): Logger {
    return new Logger({ ...this.context, ...context }, {}, this.settings);
  }

  get level(): LogLevel {
    return this.settings.level;
  }

  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.settings.level];
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...meta,
    };

    const formatted = this.settings.format === 'json'
      ? formatJson(entry)
      : formatPretty(entry, this.settings.colors);

    this.settings.sink.write(`${formatted}\n`);
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

  /**
   * Create a timer that logs at debug level on completion
   */
  startTimer(message: string, meta?: Record<string, unknown>): { end: (extra?: Record<string, unknown>) => void } {
    const start = Date.now();
    return {
      end: (extra?: Record<string, unknown>) => {
        this.debug(message, { ...meta, ...extra, duration: Date.now() - start });
      },
    };
  }
}

/**
 * A logger that discards everything, for library callers and tests
 */
export function silentLogger(): Logger {
  return new Logger({}, { level: 'error', sink: { write: () => true } });
}
