import winston from 'winston';
import { config } from '../config/index.js';

const isProduction = config.nodeEnv === 'production';

const devFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} ${level}: ${message}${extra}`;
});

export const logger = winston.createLogger({
  level: config.logLevel,
  format: isProduction
    ? winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      )
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
        devFormat
      ),
  transports: [new winston.transports.Console()],
});

export default logger;
