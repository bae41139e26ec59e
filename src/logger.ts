import pino, { type DestinationStream, type LoggerOptions } from 'pino';

export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export interface LoggerConfiguration {
  level?: LoggerOptions['level'];
  base?: LoggerOptions['base'];
  destination?: DestinationStream;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const DEFAULT_LEVEL: LoggerOptions['level'] = 'silent';
const DEFAULT_BASE = { service: 'external-link-auditor' } as const;

let activeLogger: LoggerLike = createPinoInstance();

export function configureLogger(config: LoggerConfiguration = {}): void {
  const { level = DEFAULT_LEVEL, base = DEFAULT_BASE, destination } = config;
  activeLogger = createPinoInstance({ level, base }, destination);
}

export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

export function getLogger(component?: string): LoggerLike {
  return component ? activeLogger.child({ component }) : activeLogger;
}

export function isLogLevel(value: string): value is (typeof LOG_LEVELS)[number] {
  return LOG_LEVELS.some((level) => level === value);
}

function createPinoInstance(
  options: Partial<LoggerOptions> = {},
  destination?: DestinationStream,
): LoggerLike {
  const merged: LoggerOptions = {
    level: options.level ?? DEFAULT_LEVEL,
    base: options.base ?? DEFAULT_BASE,
  };

  if (destination) {
    return pino(merged, destination);
  }

  return pino(merged);
}
