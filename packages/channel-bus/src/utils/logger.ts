/**
 * Logger utility shared by the bus and the pipeline nodes
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerConfig {
  /** Follows the global level when omitted */
  level?: LogLevel;
  prefix: string;
  timestamps: boolean;
  colors: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const DEFAULT_CONFIG: LoggerConfig = {
  prefix: '',
  timestamps: true,
  colors: true,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

// Global level, read at call time by loggers without their own level
const envLevel = process.env.PIPELINE_LOG_LEVEL;
let globalLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setGlobalLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLevel;
}

type EmittingLevel = Exclude<LogLevel, 'silent'>;

export class Logger {
  private config: LoggerConfig;

  constructor(prefix: string, config: Partial<LoggerConfig> = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      prefix,
    };
  }

  private shouldLog(level: EmittingLevel): boolean {
    const threshold = this.config.level ?? globalLevel;
    return LOG_LEVELS[level] >= LOG_LEVELS[threshold];
  }

  private formatTimestamp(): string {
    if (!this.config.timestamps) return '';
    return new Date().toISOString().split('T')[1].slice(0, -1);
  }

  private formatMessage(level: EmittingLevel, message: string, data?: unknown): string {
    const timestamp = this.formatTimestamp();
    const prefix = this.config.prefix ? `[${this.config.prefix}]` : '';

    let levelStr = level.toUpperCase().padEnd(5);
    const dataStr = data !== undefined ? ` ${this.formatData(data)}` : '';

    if (this.config.colors) {
      const color = {
        debug: COLORS.gray,
        info: COLORS.cyan,
        warn: COLORS.yellow,
        error: COLORS.red,
      }[level];

      levelStr = `${color}${levelStr}${COLORS.reset}`;
      if (timestamp) {
        return `${COLORS.dim}${timestamp}${COLORS.reset} ${levelStr} ${COLORS.blue}${prefix}${COLORS.reset} ${message}${dataStr}`;
      }
    }

    return `${timestamp} ${levelStr} ${prefix} ${message}${dataStr}`.trim();
  }

  private formatData(data: unknown): string {
    if (data instanceof Error) {
      return `${data.name}: ${data.message}`;
    }
    return JSON.stringify(data);
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog('debug')) {
      console.log(this.formatMessage('debug', message, data));
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage('info', message, data));
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, data));
    }
  }

  error(message: string, data?: unknown): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, data));
    }
  }

  /**
   * Create a child logger with additional prefix
   */
  child(prefix: string): Logger {
    const newPrefix = this.config.prefix ? `${this.config.prefix}:${prefix}` : prefix;
    return new Logger(newPrefix, this.config);
  }

  /**
   * Pin this logger to a level, or pass undefined to follow the global one again
   */
  setLevel(level: LogLevel | undefined): void {
    this.config.level = level;
  }

  setColors(enabled: boolean): void {
    this.config.colors = enabled;
  }
}

export function createLogger(prefix: string, config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(prefix, { colors: process.stdout.isTTY === true, ...config });
}

// Pre-configured loggers for each module
export const busLogger = createLogger('Bus');
export const transportLogger = createLogger('Transport');
export const nodeLogger = createLogger('Node');
export const archiveLogger = createLogger('Archive');
export const settingsLogger = createLogger('Settings');
