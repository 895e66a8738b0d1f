import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

interface LoggerOptions {
  level: LogLevel;
  file?: string;
  echo: boolean; // mirror to stderr; stdout belongs to the hook protocol
}

const envLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
let options: LoggerOptions = {
  level: isLogLevel(envLevel) ? envLevel : 'info',
  echo: true
};

export function configureLogger(patch: Partial<LoggerOptions>): void {
  options = { ...options, ...patch };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function write(level: Exclude<LogLevel, 'silent'>, tag: string, message: string): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[options.level]) return;

  const line = `${new Date().toISOString()} ${level.toUpperCase()} [${tag}] ${message}`;
  if (options.echo) console.error(line);
  if (options.file) {
    try {
      mkdirSync(dirname(options.file), { recursive: true });
      appendFileSync(options.file, line + '\n', 'utf-8');
    } catch (error) {
      if (!options.echo) console.error(line);
      console.error(`[Logger] Failed to append to ${options.file}: ${describeError(error)}`);
    }
  }
}

export const logger = {
  debug: (tag: string, message: string) => write('debug', tag, message),
  info: (tag: string, message: string) => write('info', tag, message),
  warn: (tag: string, message: string) => write('warn', tag, message),
  error: (tag: string, message: string) => write('error', tag, message)
};
