export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(tag: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

/**
 * Writes `[Tag] message` lines to the console, dropping anything below the
 * configured level.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly tag: string = 'taskmesh',
    private readonly level: LogLevel = 'info'
  ) {}

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(this.format(message), ...details);
    }
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) {
      console.log(this.format(message), ...details);
    }
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.format(message), ...details);
    }
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.format(message), ...details);
    }
  }

  child(tag: string): Logger {
    return new ConsoleLogger(tag, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(message: string): string {
    return `[${this.tag}] ${message}`;
  }
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger
};
