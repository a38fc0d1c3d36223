import * as p from '@clack/prompts';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger writing through @clack/prompts. Debug lines only appear when
 * verbose is set.
 */
export function createCliLogger(verbose = false): Logger {
  return {
    debug: (message) => {
      if (verbose) p.log.message(chalk.dim(message));
    },
    info: (message) => p.log.info(message),
    warn: (message) => p.log.warn(message),
    error: (message) => p.log.error(message),
  };
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export interface MemoryLogger extends Logger {
  entries: LogEntry[];
  messages(level: LogLevel): string[];
}

/** Logger that records entries, for tests and quiet runs. */
export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}
