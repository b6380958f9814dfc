import { Verbosity, isVerbosity } from '@brillopad/parser';

export interface AppConfig {
  port: number;
  uploadDir: string;
  maxFileSize: number; // bytes
  logLevel: Verbosity;
  logcat: {
    /** Year assumed for logcat timestamps; unset means the current year. */
    year?: number;
    ringBufferSize: number;
    preambleSize: number;
  };
  resultTtlMs: number;
}

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`${key} must be an integer, got "${raw}"`);
  }
  return value;
}

function envLogLevel(): Verbosity {
  const raw = env('BRILLOPAD_LOG_LEVEL', 'warn').toLowerCase();
  if (!isVerbosity(raw)) {
    throw new Error(`BRILLOPAD_LOG_LEVEL must be one of debug, info, warn, error, silent; got "${raw}"`);
  }
  return raw;
}

export function loadConfig(): AppConfig {
  const year = process.env.LOGCAT_YEAR ? envInt('LOGCAT_YEAR', 0) : undefined;
  return {
    port: envInt('PORT', 8000),
    uploadDir: env('UPLOAD_DIR', '/tmp/brillopad-uploads'),
    maxFileSize: envInt('MAX_FILE_SIZE', 200 * 1024 * 1024), // 200MB
    logLevel: envLogLevel(),
    logcat: {
      year,
      ringBufferSize: envInt('LOGCAT_RING_BUFFER_SIZE', 500),
      preambleSize: envInt('LOGCAT_PREAMBLE_SIZE', 15),
    },
    resultTtlMs: envInt('RESULT_TTL_MS', 60 * 60 * 1000), // 1 hour
  };
}

let currentConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!currentConfig) {
    currentConfig = loadConfig();
  }
  return currentConfig;
}
