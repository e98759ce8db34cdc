import { LOG_LEVELS } from '@/utils/config.ts';
import type { LogLevel } from '@/utils/config.ts';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

const isLogLevel = (value: string | undefined): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const envLevel = process.env.LOG_LEVEL;
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export const setLogLevel = (level: LogLevel): void => {
  minLevel = level;
};

const shouldLog = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

const formatTimestamp = (): string => new Date().toISOString();

const formatMessage = (
  level: LogLevel,
  scope: string | null,
  message: string,
  meta?: Record<string, unknown>,
): string => {
  const color = LEVEL_COLORS[level];
  const tag = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? `[${scope}] ` : '';
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  return `${color}[${formatTimestamp()}] ${tag}${RESET} ${scopeStr}${message}${metaStr}`;
};

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export const createLogger = (scope: string | null = null): Logger => ({
  debug: (message, meta) => {
    if (shouldLog('debug')) console.log(formatMessage('debug', scope, message, meta));
  },
  info: (message, meta) => {
    if (shouldLog('info')) console.log(formatMessage('info', scope, message, meta));
  },
  warn: (message, meta) => {
    if (shouldLog('warn')) console.warn(formatMessage('warn', scope, message, meta));
  },
  error: (message, meta) => {
    if (shouldLog('error')) console.error(formatMessage('error', scope, message, meta));
  },
});

export const logger = createLogger();

export default logger;
