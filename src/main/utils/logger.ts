import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

const logDir = process.env.NDEF_HANDOVER_LOG_DIR;

const logger = winston.createLogger({
  level: process.env.NDEF_HANDOVER_LOG_LEVEL ?? 'info',
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  defaultMeta: { service: 'ndef-handover' },
  silent: process.env.NODE_ENV === 'test',
});

if (logDir) {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logger.add(
    new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' })
  );
  logger.add(new winston.transports.File({ filename: path.join(logDir, 'combined.log') }));
}

if (process.env.NODE_ENV !== 'production') {
  logger.add(new winston.transports.Console({ format: winston.format.simple() }));
}

export function initializeLogger(level?: string): winston.Logger {
  if (level) {
    logger.level = level;
  }
  logger.info('Logger initialized');
  return logger;
}

export { logger };
