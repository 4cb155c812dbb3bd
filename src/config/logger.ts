import winston from 'winston';
import { config } from './index';

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.env === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    config.env === 'production'
      ? winston.format.json()
      : winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
          return `[${String(timestamp)}] ${level.toUpperCase().padEnd(5)} ${String(message)}${extra}`;
        })
  ),
  transports: [new winston.transports.Console()],
});
