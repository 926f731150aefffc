/**
 * Logger setup
 *
 * JSON lines on the console. LOG_LEVEL=silent turns output off entirely,
 * which is what the test run uses.
 */

import { createLogger, format, transports } from 'winston';

const level = process.env.LOG_LEVEL || 'info';

export const logger = createLogger({
  level: level === 'silent' ? 'info' : level,
  silent: level === 'silent',
  format: format.combine(
    format.timestamp(),
    format.json()
  ),
  transports: [
    new transports.Console()
  ]
});
