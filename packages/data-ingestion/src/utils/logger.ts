import winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';

const logger = winston.createLogger({
  level,
  silent: process.env.NODE_ENV === 'test',
  defaultMeta: { service: 'data-ingestion' },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()]
});

export function setLogLevel(newLevel: string): void {
  logger.level = newLevel;
}

export default logger;
