import winston from 'winston';
import { appConfig } from '../config/appConfig';

const level = appConfig.logLevel;

export const logger = winston.createLogger({
  level: level === 'silent' ? 'info' : level,
  silent: level === 'silent',
  defaultMeta: { service: 'loan-assistant' },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()],
});
