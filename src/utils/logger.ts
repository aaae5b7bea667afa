import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Info-level line printed in green */
  success(message: string): void;
  /** Logger for a sub-scope, e.g. `chain` -> `chain:server1` */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  level?: LogLevel;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Resolve the level from LOG_LEVEL, falling back to debug/info
 */
export function resolveLogLevel(debug: boolean = false): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return debug ? 'debug' : 'info';
}

/**
 * Create a console logger with chalk-coloured output
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel();
  const scope = options.scope;
  const threshold = LEVEL_ORDER[level];

  const prefix = (): string => {
    const ts = chalk.gray(new Date().toISOString());
    return scope ? `${ts} ${chalk.cyan(`[${scope}]`)}` : ts;
  };

  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

  return {
    debug(message) {
      if (enabled('debug')) console.log(`${prefix()} ${chalk.gray(message)}`);
    },
    info(message) {
      if (enabled('info')) console.log(`${prefix()} ${chalk.blue(message)}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`${prefix()} ${chalk.yellow(`⚠ ${message}`)}`);
    },
    error(message) {
      if (enabled('error')) console.error(`${prefix()} ${chalk.red(`✗ ${message}`)}`);
    },
    success(message) {
      if (enabled('info')) console.log(`${prefix()} ${chalk.green(`✓ ${message}`)}`);
    },
    child(childScope) {
      return createLogger({ level, scope: scope ? `${scope}:${childScope}` : childScope });
    },
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
