export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** Minimal structured logger. Any logger with these four methods (pino, winston, console) fits. */
export interface Logger {
  error(message: string, meta?: Readonly<Record<string, unknown>>): void;
  warn(message: string, meta?: Readonly<Record<string, unknown>>): void;
  info(message: string, meta?: Readonly<Record<string, unknown>>): void;
  debug(message: string, meta?: Readonly<Record<string, unknown>>): void;
}
