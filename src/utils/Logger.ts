/**
 * Module-prefixed logger with a global level and a replaceable sink.
 *
 * ```ts
 * const log = new Logger('PlaybackScheduler');
 * log.warn('photo decode failed', ref);
 * // -> console.warn('[PlaybackScheduler]', 'photo decode failed', ref)
 * ```
 */

export const LogLevel = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3, SILENT: 4 } as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogSink = (level: LogLevel, ...args: unknown[]) => void;

const defaultSink: LogSink = (level, ...args) => {
  const fn =
    level === LogLevel.DEBUG
      ? console.debug
      : level === LogLevel.INFO
        ? console.info
        : level === LogLevel.WARN
          ? console.warn
          : console.error;
  fn(...args);
};

// Vite/Vitest set import.meta.env.DEV during development and testing
const isDev = import.meta.env?.DEV === true;

let currentLevel: LogLevel = isDev ? LogLevel.DEBUG : LogLevel.WARN;
let currentSink: LogSink = defaultSink;

export class Logger {
  constructor(private readonly module: string) {}

  /** Set the minimum level globally. Messages below it are dropped. */
  static setLevel(level: LogLevel): void {
    currentLevel = level;
  }

  static getLevel(): LogLevel {
    return currentLevel;
  }

  /** Replace console output with a custom sink; `null` restores the console. */
  static setSink(sink: LogSink | null): void {
    currentSink = sink ?? defaultSink;
  }

  /** Derive a logger for a sub-component, e.g. `PlaybackScheduler:cache`. */
  child(name: string): Logger {
    return new Logger(`${this.module}:${name}`);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.WARN, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.ERROR, message, args);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (currentLevel > level) return;
    currentSink(level, `[${this.module}]`, message, ...args);
  }
}
