/**
 * Logger accepted by the container. Any structured logger (pino, winston,
 * console) fits behind this shape.
 */
export interface Logger {
  debug: (message: string, context?: object) => void;
  info: (message: string, context?: object) => void;
  warn: (message: string, context?: object) => void;
  error: (message: string, context?: object) => void;
}

/**
 * Logger that drops everything. Default for containers created without one,
 * so the library is silent out of the box.
 */
export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelPriorities: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Writes to `console`, dropping messages below the configured level.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly prefix: string;

  /**
   * @param options.level - Minimum level written. Defaults to 'info'.
   * @param options.prefix - Tag prepended to every line. Defaults to 'trellis'.
   */
  constructor(options: { level?: LogLevel; prefix?: string } = {}) {
    this.minLevel = options.level ?? 'info';
    this.prefix = options.prefix ?? 'trellis';
  }

  private log(level: LogLevel, message: string, context?: object): void {
    if (levelPriorities[level] < levelPriorities[this.minLevel]) return;

    const line = `[${this.prefix}] ${level.toUpperCase()} ${message}`;
    if (context && Object.keys(context).length > 0) {
      console[level](line, context);
    } else {
      console[level](line);
    }
  }

  debug(message: string, context?: object): void {
    this.log('debug', message, context);
  }
  info(message: string, context?: object): void {
    this.log('info', message, context);
  }
  warn(message: string, context?: object): void {
    this.log('warn', message, context);
  }
  error(message: string, context?: object): void {
    this.log('error', message, context);
  }
}
