/**
 * Logging Configuration
 * Single source of truth for logger behavior
 */

import type { LevelWithSilent } from 'pino';

export interface LoggingConfig {
  level: LevelWithSilent;
  redactPaths: string[];
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseLevel(raw: string | undefined): LevelWithSilent {
  const match = LEVELS.find(level => level === raw?.trim().toLowerCase());
  return match ?? 'info';
}

export function getLoggingConfig(): LoggingConfig {
  const redactFields = (process.env.LOG_REDACT_FIELDS ||
    'authorization,apiKey,api_key,key,token,password,secret')
    .split(',').map(f => f.trim()).filter(Boolean);

  return {
    level: parseLevel(process.env.LOG_LEVEL),
    // Redact both top-level and one-level-nested occurrences
    redactPaths: redactFields.flatMap(field => [field, `*.${field}`])
  };
}
