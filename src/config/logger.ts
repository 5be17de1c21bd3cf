/**
 * Winston Logger Configuration
 *
 * Structured JSON logs go to stderr so that stdout only carries the
 * operator-facing trim report.
 */

import winston from 'winston';
import { config } from './index';

export const logger = winston.createLogger({
  level: config.logLevel,
  defaultMeta: { service: config.service.name },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: Object.keys(winston.config.npm.levels),
    }),
  ],
  silent: config.nodeEnv === 'test',
});
