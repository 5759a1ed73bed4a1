import { env } from '../../config/environment.js';

/**
 * Log levels in order of severity
 */
const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.cyan,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_WRITERS: Record<LogLevel, (...data: unknown[]) => void> = {
  debug: (...data) => console.debug(...data),
  info: (...data) => console.info(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data),
};

/**
 * Namespaced console logger with coloured, timestamped lines.
 * The minimum level comes from LOG_LEVEL.
 */
export class Logger {
  private readonly namespace: string;
  private readonly level: LogLevel;

  constructor(namespace: string, level: LogLevel = env.LOG_LEVEL) {
    this.namespace = namespace;
    this.level = level;
  }

  private timestamp(): string {
    return new Date().toISOString().replace('T', ' ').substring(0, 23);
  }

  private format(level: LogLevel, message: string): string {
    const levelStr = level.toUpperCase().padEnd(5);

    return `${COLORS.dim}${this.timestamp()}${COLORS.reset} ${LEVEL_COLORS[level]}${levelStr}${COLORS.reset} ${COLORS.magenta}[${this.namespace}]${COLORS.reset} ${message}`;
  }

  /**
   * Whether a message at this level would be written
   */
  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (this.isEnabled(level)) {
      LEVEL_WRITERS[level](this.format(level, message), ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  /**
   * Create a child logger with a sub-namespace (e.g. "Benchmark:Store")
   */
  child(subNamespace: string): Logger {
    return new Logger(`${this.namespace}:${subNamespace}`, this.level);
  }
}
