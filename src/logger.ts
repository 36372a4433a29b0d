import winston from 'winston';
import { loadConfig } from './config.ts';

// Diagnostics go to stderr so streamed output on stdout stays clean.
export const logger = winston.createLogger({
  level: loadConfig().logLevel,
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf((info) => `${info.timestamp} vcdiff ${info.level}: ${info.message}`)
      ),
    }),
  ],
  exitOnError: false,
});
