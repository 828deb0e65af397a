import pino from 'pino';
import { config } from '../config.js';

// stdout is reserved for the run's confirmation line
export const logger =
  config.NODE_ENV === 'development'
    ? pino({
        level: config.LOG_LEVEL,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, destination: 2 },
        },
      })
    : pino({ level: config.LOG_LEVEL }, pino.destination(2));
