/**
 * Structured Logger
 *
 * Levels debug/info/warn/error, human-readable or JSON lines, module child
 * loggers and operation-scoped loggers. Level and format come from
 * LOG_LEVEL / LOG_FORMAT unless set explicitly.
 *
 * The translation core never logs; the driver and the CLI do.
 */

/** Log levels in order of severity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'text' | 'json';

/** Numeric values for log level comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

/** Log entry structure */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Logger context (module name) */
  context: string;
  message: string;
  data?: Record<string, unknown>;
  /** Error stack trace */
  stack?: string;
  operation?: string;
  service: string;
}

/** Where formatted lines go; warn and error use `stderr` */
export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface LoggerConfig {
  /** Minimum level written */
  level: LogLevel;
  format: LogFormat;
  /** Module name, `parent:child` for child loggers */
  context: string;
  timestamps: boolean;
  /** Service name for log aggregation */
  service: string;
  /** Fields included in every entry */
  defaultFields?: Record<string, unknown>;
  sink: LogSink;
}

const consoleSink: LogSink = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
};

function getLogLevelFromEnv(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

function getLogFormatFromEnv(): LogFormat {
  return process.env['LOG_FORMAT']?.toLowerCase() === 'json' ? 'json' : 'text';
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

/**
 * Format a log entry as human-readable text
 */
export function formatText(entry: LogEntry, timestamps: boolean): string {
  const parts: string[] = [];

  if (timestamps) {
    const time = new Date(entry.timestamp).toLocaleTimeString('en-US', {
      hour12: false,
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    parts.push(`${COLORS.dim}${time}${COLORS.reset}`);
  }

  parts.push(`${LEVEL_COLORS[entry.level]}${LEVEL_LABELS[entry.level]}${COLORS.reset}`);
  parts.push(`${COLORS.cyan}[${entry.context}]${COLORS.reset}`);

  if (entry.operation) {
    parts.push(`${COLORS.dim}(${entry.operation})${COLORS.reset}`);
  }

  parts.push(entry.message);

  if (entry.data && Object.keys(entry.data).length > 0) {
    const dataStr = Object.entries(entry.data)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    parts.push(`${COLORS.dim}${dataStr}${COLORS.reset}`);
  }

  let output = parts.join(' ');
  if (entry.stack) {
    output += `\n${COLORS.dim}${entry.stack}${COLORS.reset}`;
  }
  return output;
}

/**
 * Logger class for structured logging
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly minLevel: number;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? getLogLevelFromEnv(),
      format: config.format ?? getLogFormatFromEnv(),
      context: config.context ?? 'wiki2vault',
      timestamps: config.timestamps ?? true,
      service: config.service ?? process.env['SERVICE_NAME'] ?? 'wiki2vault',
      sink: config.sink ?? consoleSink,
    };
    if (config.defaultFields !== undefined) {
      this.config.defaultFields = config.defaultFields;
    }
    this.minLevel = LOG_LEVEL_VALUES[this.config.level];
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= this.minLevel;
  }

  private write(entry: LogEntry): void {
    const output =
      this.config.format === 'json'
        ? JSON.stringify(entry)
        : formatText(entry, this.config.timestamps);

    if (entry.level === 'error' || entry.level === 'warn') {
      this.config.sink.stderr(output);
    } else {
      this.config.sink.stdout(output);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.config.context,
      message,
      service: this.config.service,
    };

    if (this.config.defaultFields) {
      entry.data = { ...this.config.defaultFields };
    }

    if (data) {
      const error = data['error'];
      if (error instanceof Error) {
        if (error.stack) {
          entry.stack = error.stack;
        }
        data = { ...data, error: error.message };
      }
      entry.data = { ...entry.data, ...data };
    }

    if (operation) {
      entry.operation = operation;
    }

    this.write(entry);
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('debug', message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('info', message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('warn', message, data, operation);
  }

  error(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('error', message, data, operation);
  }

  /**
   * Log an error with its stack trace
   */
  errorWithStack(
    message: string,
    error: Error,
    data?: Record<string, unknown>,
    operation?: string
  ): void {
    this.log('error', message, { ...data, error, errorName: error.name }, operation);
  }

  /**
   * Child logger for a sub-module: `parent:child` context
   */
  child(context: string): Logger {
    return new Logger({
      ...this.config,
      context: `${this.config.context}:${context}`,
    });
  }

  withOperation(operation: string): OperationLogger {
    return new OperationLogger(this, operation);
  }

  /**
   * Logger that adds `fields` to every entry
   */
  withFields(fields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: { ...this.config.defaultFields, ...fields },
    });
  }

  /**
   * Same context and fields at another level or format
   */
  reconfigure(overrides: Partial<Pick<LoggerConfig, 'level' | 'format' | 'sink'>>): Logger {
    return new Logger({ ...this.config, ...overrides });
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config };
  }
}

/**
 * Operation-scoped logger that includes the operation name
 */
export class OperationLogger {
  constructor(
    private readonly logger: Logger,
    private readonly operation: string
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(message, data, this.operation);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(message, data, this.operation);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(message, data, this.operation);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.logger.error(message, data, this.operation);
  }
}

/**
 * Logger factory, replaceable in tests
 */
export interface LoggerProvider {
  createLogger(context: string): Logger;
}

class DefaultLoggerProvider implements LoggerProvider {
  private readonly loggerCache = new Map<string, Logger>();

  createLogger(context: string): Logger {
    let logger = this.loggerCache.get(context);
    if (!logger) {
      logger = new Logger({ context });
      this.loggerCache.set(context, logger);
    }
    return logger;
  }
}

let loggerProvider: LoggerProvider = new DefaultLoggerProvider();

/**
 * Replace the logger provider
 * @returns The previous provider, for restoration
 */
export function setLoggerProvider(provider: LoggerProvider): LoggerProvider {
  const previous = loggerProvider;
  loggerProvider = provider;
  return previous;
}

export function resetLoggerProvider(): void {
  loggerProvider = new DefaultLoggerProvider();
}

/**
 * Logger for a module, from the current provider
 */
export function createLogger(context: string): Logger {
  return loggerProvider.createLogger(context);
}
