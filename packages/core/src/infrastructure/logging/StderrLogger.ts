import { z } from 'zod';
import type { Logger, LogLevel } from '../../domain/ports/Logger.js';

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export interface StderrLoggerConfig {
  readonly level: LogLevel;
  readonly prefix?: string;
  /** Where lines go. Defaults to `process.stderr`. */
  readonly write?: (line: string) => void;
}

/** Logger writing one line per entry to stderr, so stdout stays free for program output. */
export class StderrLogger implements Logger {
  private level: LogLevel;
  private readonly prefix: string;
  private readonly write: (line: string) => void;

  constructor(config: StderrLoggerConfig = { level: 'warn' }) {
    this.level = config.level;
    this.prefix = config.prefix ?? 'rowmodel';
    this.write = config.write ?? ((line) => process.stderr.write(line));
  }

  error(message: string, meta?: Readonly<Record<string, unknown>>): void {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: Readonly<Record<string, unknown>>): void {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: Readonly<Record<string, unknown>>): void {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: Readonly<Record<string, unknown>>): void {
    this.log('debug', message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private log(level: LogLevel, message: string, meta?: Readonly<Record<string, unknown>>): void {
    if (LEVELS.indexOf(level) > LEVELS.indexOf(this.level)) return;
    const suffix = meta ? ` ${JSON.stringify(meta)}` : '';
    this.write(`[${this.prefix}] ${level.toUpperCase()}: ${message}${suffix}\n`);
  }
}

/** Read the log level from `ROWMODEL_LOG_LEVEL`, falling back to `warn` when unset or unknown. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = logLevelSchema.safeParse(env['ROWMODEL_LOG_LEVEL']?.toLowerCase());
  return parsed.success ? parsed.data : 'warn';
}

export function createLogger(config: Partial<StderrLoggerConfig> = {}): StderrLogger {
  return new StderrLogger({ ...config, level: config.level ?? resolveLogLevel() });
}

/** Logger used when the caller supplies none. */
export const defaultLogger: Logger = createLogger();
