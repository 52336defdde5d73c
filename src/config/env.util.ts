import { LogLevel } from '@nestjs/common';

/** Parses a positive integer env value, falling back when missing or malformed */
export function readPositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

// Ordered from least to most verbose
const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Maps TRADEDESK_LOG_LEVEL to the Nest logger levels to enable.
 * "debug" -> error, warn, log, debug. Unknown or missing -> error only,
 * so stdout stays clean for table/JSON output.
 */
export function resolveLogLevels(raw: string | undefined): LogLevel[] {
  const requested = (raw ?? '').trim().toLowerCase();
  if (!isLogLevel(requested)) {
    return ['error'];
  }
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(requested) + 1);
}
