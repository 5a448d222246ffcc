export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

/** Minimum level from `LOG_LEVEL`; the library stays quiet below `warn` by default */
function getMinLevel(): LogLevel {
  const env = process.env.LOG_LEVEL;
  return isLogLevel(env) ? env : 'warn';
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
  child(extra: Record<string, unknown>): Logger;
}

function emit(
  level: LogLevel,
  service: string,
  msg: string,
  baseExtra: Record<string, unknown>,
  extra?: Record<string, unknown>
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[getMinLevel()]) return;

  const line = JSON.stringify({
    level,
    service,
    msg,
    ts: new Date().toISOString(),
    ...baseExtra,
    ...extra,
  });

  process.stderr.write(`${line}\n`);
}

/** Structured logger writing one JSON line per event to stderr */
export function createLogger(
  service: string,
  baseExtra: Record<string, unknown> = {}
): Logger {
  return {
    debug(msg, extra) {
      emit('debug', service, msg, baseExtra, extra);
    },
    info(msg, extra) {
      emit('info', service, msg, baseExtra, extra);
    },
    warn(msg, extra) {
      emit('warn', service, msg, baseExtra, extra);
    },
    error(msg, extra) {
      emit('error', service, msg, baseExtra, extra);
    },
    child(extra) {
      return createLogger(service, { ...baseExtra, ...extra });
    },
  };
}

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return noopLogger;
  },
};
