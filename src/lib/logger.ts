/* eslint-disable no-console */
import { getEnvVar } from './env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerMetadata = Record<string, unknown>;

type LoggerOptions = {
  module: string;
  /** Overrides LOG_LEVEL for this logger. */
  minLevel?: LogLevel | 'silent';
};

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// Resolved on every call so a replaced console method is picked up.
const consoleWriters = {
  debug: (...args: unknown[]) => console.debug(...args),
  info: (...args: unknown[]) => console.info(...args),
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
} as const;

const isLevel = (value: string): value is LogLevel | 'silent' =>
  Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

export const resolveMinLevel = (value?: string | null): LogLevel | 'silent' => {
  if (typeof value !== 'string') {
    return 'info';
  }
  const normalised = value.trim().toLowerCase();
  return isLevel(normalised) ? normalised : 'info';
};

const formatConsolePayload = (
  level: LogLevel,
  module: string,
  message: string,
  metadata: LoggerMetadata,
) => {
  const timestamp = new Date().toISOString();
  return [`[${timestamp}] [${level.toUpperCase()}] [${module}] ${message}`, metadata] as const;
};

const createEmitter =
  ({ module, minLevel }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    const threshold = minLevel ?? resolveMinLevel(getEnvVar('LOG_LEVEL'));
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }

    const enrichedMetadata = {
      ...metadata,
      module,
      timestamp: new Date().toISOString(),
      level,
    };

    const [consoleMessage, consoleMetadata] = formatConsolePayload(
      level,
      module,
      message,
      enrichedMetadata,
    );

    consoleWriters[level](consoleMessage, consoleMetadata);
  };

export const createLogger = (options: LoggerOptions) => ({
  debug: createEmitter(options, 'debug'),
  info: createEmitter(options, 'info'),
  warn: createEmitter(options, 'warn'),
  error: createEmitter(options, 'error'),
});

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (module: string): Logger => {
  const cached = loggerCache.get(module);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module });
  loggerCache.set(module, logger);
  return logger;
};
