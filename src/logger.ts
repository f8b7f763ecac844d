/**
 * Structured logger using Pino.
 *
 * Emits newline-delimited JSON on stderr so that stdout carries only the
 * JSON/CSV reports the commands print.
 */

import pino from 'pino';

export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? 'info',
    base: { service: 'sc-fleet' },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

export type Logger = typeof logger;
