import path from 'path';
import winston from 'winston';
import { config } from '../config';

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${details}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];

if (config.logging.toFile) {
  transports.push(
    new winston.transports.File({
      filename: path.join(config.logging.dir, 'error.log'),
      level: 'error',
      format: fileFormat,
    }),
    new winston.transports.File({
      filename: path.join(config.logging.dir, 'gateway.log'),
      format: fileFormat,
    })
  );
}

export const logger = winston.createLogger({
  level: Object.keys(levels).includes(config.logging.level) ? config.logging.level : 'info',
  levels,
  transports,
});

export default logger;
