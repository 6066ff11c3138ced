/**
 * Console output for the CLI.
 *
 * Query results go to stdout through `info`; progress, warnings and errors
 * go to stderr so that piped output stays clean.
 */

/**
 * Log levels for filtering output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * Output function for results.
   * @default console.log
   */
  stdout?: (line: string) => void;

  /**
   * Output function for status, warnings and errors.
   * @default console.error
   */
  stderr?: (line: string) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  private level: LogLevel;
  private stdout: (line: string) => void;
  private stderr: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      this.stderr(`[DEBUG] ${message}`);
    }
  }

  /**
   * One line of results.
   */
  info(message: string): void {
    if (this.shouldLog('info')) {
      this.stdout(message);
    }
  }

  /**
   * Progress and summaries, kept off stdout.
   */
  status(message: string): void {
    if (this.shouldLog('info')) {
      this.stderr(message);
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      this.stderr(`Warning: ${message}`);
    }
  }

  error(message: string): void {
    if (this.shouldLog('error')) {
      this.stderr(`Error: ${message}`);
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
