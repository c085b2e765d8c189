/**
 * Structured Logger
 *
 * JSON logs via pino, level from LOG_LEVEL, sensitive fields redacted.
 * Call style: logger.info({ requestId, stage, event }, '[PLANNER] message')
 */

import { pino, type Logger } from 'pino';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

export const logger: Logger = pino({
  level: config.level,
  redact: { paths: config.redactPaths, censor: '[REDACTED]' },
  base: { service: 'route-planner' },
  timestamp: pino.stdTimeFunctions.isoTime
});

export type { Logger };
