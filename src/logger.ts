/**
 * Scoped, leveled logging to stderr.
 *
 * Level comes from `LLM_UNIFY_LOG_LEVEL` (debug | info | warn | error | silent),
 * default `warn`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let levelOverride: LogLevel | undefined;

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Current threshold. An explicit `setLogLevel` wins over the environment.
 */
export function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride;
  const fromEnv = process.env.LLM_UNIFY_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

export function setLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
}

function format(scope: string, event: string, fields?: LogFields): string {
  const suffix = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
  return `[llm-unify:${scope}] ${event}${suffix}`;
}

export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, event: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[getLogLevel()]) return;
    const line = format(scope, event, fields);
    // console.warn and console.error both write to stderr
    if (level === 'warn') console.warn(line);
    else console.error(line);
  };

  return {
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
  };
}
