// src/utils/logger.ts
import winston from 'winston';
import { getConfig } from '../config';

const { logLevel, nodeEnv } = getConfig();

const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'ledger-api' },
  transports: [],
});

if (nodeEnv !== 'production') {
  logger.add(new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(
        (info: winston.Logform.TransformableInfo) =>
          `${String(info.timestamp)} ${info.level}: ${String(info.message)}${info.stack ? `\n${String(info.stack)}` : ''}`
      )
    ),
  }));
} else {
  logger.add(new winston.transports.Console({
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  }));
}

export default logger;
