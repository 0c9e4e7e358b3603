import pino from 'pino';

/**
 * Shared structured logger. Operator-facing progress lines are printed by
 * the CLI itself on stdout; diagnostics go to stderr.
 */
export const logger = pino(
  {
    name: 'check-data-sources',
    level: process.env['LOG_LEVEL'] ?? 'info'
  },
  pino.destination(2)
);
