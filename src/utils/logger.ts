/**
 * Structured logging infrastructure.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_STYLES: Record<EmittingLevel, { tag: string; paint: (text: string) => string }> = {
  debug: { tag: '[DEBUG]', paint: chalk.gray },
  info: { tag: '[INFO]', paint: chalk.blue },
  warn: { tag: '[WARN]', paint: chalk.yellow },
  error: { tag: '[ERROR]', paint: chalk.red },
};

/**
 * Destination for formatted log lines.
 * Defaults to the console; tests and embedding tools can swap it out.
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  sink?: LogSink;
}

/**
 * Level-filtered logger used by the regeneration session.
 */
class Logger {
  private level: LogLevel;
  private prefix: string;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? '';
    this.sink = options.sink ?? consoleSink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  isEnabled(level: EmittingLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isEnabled('error')) return;
    this.write('error', `${LEVEL_STYLES.error.tag} ${this.withPrefix(message)}`);
    if (error instanceof Error) {
      this.write('error', error.stack || error.message);
    } else if (error) {
      this.write('error', JSON.stringify(error, null, 2));
    }
  }

  /**
   * Log a success line, e.g. a file rewritten without conflicts.
   */
  success(message: string): void {
    if (!this.isEnabled('info')) return;
    this.sink.out(chalk.green(`✓ ${this.withPrefix(message)}`));
  }

  /**
   * Log a failure line, e.g. a file skipped because its markers did not parse.
   */
  fail(message: string): void {
    if (!this.isEnabled('info')) return;
    this.sink.out(chalk.red(`✗ ${this.withPrefix(message)}`));
  }

  /**
   * Create a child logger that shares level and sink, with a nested prefix.
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      sink: this.sink,
    });
  }

  private emit(level: EmittingLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    this.write(level, `${LEVEL_STYLES[level].tag} ${this.withPrefix(message)}`);
    if (data) {
      this.write(level, JSON.stringify(data, null, 2));
    }
  }

  private write(level: EmittingLevel, text: string): void {
    const painted = LEVEL_STYLES[level].paint(text);
    if (level === 'warn' || level === 'error') {
      this.sink.err(painted);
    } else {
      this.sink.out(painted);
    }
  }

  private withPrefix(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }
}

// Shared instance for callers that do not pass their own
export const logger = new Logger();

export { Logger };
