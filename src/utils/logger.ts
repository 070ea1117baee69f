/**
 * Leveled console logger shared by the CLI and the generators.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type MessageLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LevelStyle {
  tag: string;
  color: (text: string) => string;
  stream: 'log' | 'warn' | 'error';
}

const STYLES: Record<MessageLevel, LevelStyle> = {
  debug: { tag: '[DEBUG]', color: (text) => chalk.gray(text), stream: 'log' },
  info: { tag: '[INFO]', color: (text) => chalk.blue(text), stream: 'log' },
  warn: { tag: '[WARN]', color: (text) => chalk.yellow(text), stream: 'warn' },
  error: { tag: '[ERROR]', color: (text) => chalk.red(text), stream: 'error' },
};

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', message, data && JSON.stringify(data, null, 2));
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, data && JSON.stringify(data, null, 2));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, data && JSON.stringify(data, null, 2));
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    const detail = error instanceof Error ? error.stack || error.message : error && JSON.stringify(error, null, 2);
    this.emit('error', message, detail);
  }

  /**
   * Mark a finished step; shown at info level.
   */
  success(message: string): void {
    if (this.enabled('info')) console.log(chalk.green(`✓ ${message}`));
  }

  fail(message: string): void {
    if (this.enabled('info')) console.log(chalk.red(`✗ ${message}`));
  }

  private enabled(level: MessageLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private emit(level: MessageLevel, message: string, detail?: string): void {
    if (!this.enabled(level)) return;
    const { tag, color, stream } = STYLES[level];
    console[stream](color(`${tag} ${message}`));
    if (detail) {
      console[stream](color(detail));
    }
  }
}

export const logger = new Logger();

export { Logger };
