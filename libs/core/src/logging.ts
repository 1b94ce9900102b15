import { LogLevel } from '@nestjs/common';

const ORDER: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

const LEVEL_ALIASES: Record<string, LogLevel> = {
  fatal: 'fatal',
  error: 'error',
  warn: 'warn',
  info: 'log',
  log: 'log',
  debug: 'debug',
  trace: 'verbose',
  verbose: 'verbose',
};

/** `LOG_LEVEL=info` → every Nest level up to and including `log`. */
export const toNestLogLevels = (level: string | undefined): LogLevel[] => {
  const mapped = LEVEL_ALIASES[(level ?? 'info').trim().toLowerCase()] ?? 'log';
  return ORDER.slice(0, ORDER.indexOf(mapped) + 1);
};
