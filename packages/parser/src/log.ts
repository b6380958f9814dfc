// ============================================================
// Operational logging
// ============================================================

export type Verbosity = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const VERBOSITY_ORDER: Record<Verbosity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isVerbosity(value: string): value is Verbosity {
  return Object.prototype.hasOwnProperty.call(VERBOSITY_ORDER, value);
}

function initialVerbosity(): Verbosity {
  const fromEnv = process.env.BRILLOPAD_LOG_LEVEL?.toLowerCase();
  return fromEnv && isVerbosity(fromEnv) ? fromEnv : 'warn';
}

let threshold: Verbosity = initialVerbosity();

export function setLogLevel(level: Verbosity): void {
  threshold = level;
}

export function getLogLevel(): Verbosity {
  return threshold;
}

function enabled(level: Exclude<Verbosity, 'silent'>): boolean {
  return VERBOSITY_ORDER[level] >= VERBOSITY_ORDER[threshold];
}

/**
 * Create a logger whose lines are prefixed with `[brillopad:<scope>]`.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[brillopad:${scope}]`;
  return {
    debug: (message) => {
      if (enabled('debug')) console.debug(prefix, message);
    },
    info: (message) => {
      if (enabled('info')) console.info(prefix, message);
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(prefix, message);
    },
    error: (message) => {
      if (enabled('error')) console.error(prefix, message);
    },
  };
}
