/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
  setLevel?(level: LogLevel | string): void;
}

export type LogMeta = Record<string, unknown>;

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  name?: string;
  timestamp?: boolean;
  colorize?: boolean;
  json?: boolean;
}

/**
 * Log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  logger: string;
  message: string;
  meta?: LogMeta;
  error?: Error;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m',
  [LogLevel.INFO]: '\x1b[32m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.ERROR]: '\x1b[31m',
  [LogLevel.SILENT]: ''
};

/**
 * Parse a level name such as "debug" or "WARN"
 */
export function parseLogLevel(level: string): LogLevel | undefined {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Console logger implementation.
 *
 * Everything goes to stderr so that command output on stdout stays clean.
 */
export class ConsoleLogger implements ILogger {
  private config: LoggerConfig;
  readonly name: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: LogLevel.INFO,
      timestamp: true,
      colorize: true,
      json: false,
      ...config
    };
    this.name = config.name || 'App';
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    this.log(LogLevel.ERROR, message, meta, error instanceof Error ? error : undefined);
  }

  setLevel(level: LogLevel | string): void {
    if (typeof level === 'string') {
      const parsed = parseLogLevel(level);
      if (parsed !== undefined) {
        this.config.level = parsed;
      }
    } else {
      this.config.level = level;
    }
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  private log(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (level < this.config.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      logger: this.name,
      message,
      meta,
      error
    };

    console.error(this.config.json ? this.formatJson(entry) : this.formatPretty(entry));
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: LogLevel[entry.level],
      logger: entry.logger,
      message: entry.message,
      ...(entry.meta && { meta: entry.meta }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message
        }
      })
    });
  }

  private formatPretty(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamp) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(this.getLevelString(entry.level));
    parts.push(`[${entry.logger}]`);
    parts.push(entry.message);

    if (entry.meta && Object.keys(entry.meta).length > 0) {
      parts.push(JSON.stringify(entry.meta));
    }

    if (entry.error) {
      parts.push(`- ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private getLevelString(level: LogLevel): string {
    const levelName = LogLevel[level];

    if (!this.config.colorize) {
      return `[${levelName}]`;
    }

    return `${LEVEL_COLORS[level]}[${levelName}]\x1b[0m`;
  }
}

/**
 * Logger factory
 */
export class LoggerFactory {
  private static loggers: Map<string, ConsoleLogger> = new Map();
  private static defaultConfig: Partial<LoggerConfig> = {
    level: LogLevel.INFO,
    timestamp: true,
    colorize: true
  };

  /**
   * Create or get logger
   */
  static getLogger(name: string, config?: Partial<LoggerConfig>): ConsoleLogger {
    const key = name || 'default';
    const existing = this.loggers.get(key);
    if (existing) {
      return existing;
    }

    const logger = new ConsoleLogger({
      ...this.defaultConfig,
      ...config,
      name: key
    });
    this.loggers.set(key, logger);
    return logger;
  }

  /**
   * Set default configuration; existing loggers pick up a new level
   */
  static setDefaultConfig(config: Partial<LoggerConfig>): void {
    this.defaultConfig = { ...this.defaultConfig, ...config };
    if (config.level !== undefined) {
      const level = config.level;
      this.loggers.forEach(logger => logger.setLevel(level));
    }
  }

  static clear(): void {
    this.loggers.clear();
  }
}

/**
 * Create child logger named `<parent>.<name>`
 */
export function createChildLogger(parent: ILogger, name: string): ILogger {
  if (parent instanceof ConsoleLogger) {
    return LoggerFactory.getLogger(`${parent.name}.${name}`, { level: parent.getLevel() });
  }
  return parent;
}

export type Logger = ILogger;
