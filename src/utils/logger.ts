import * as path from 'path';
import winston from 'winston';

// Get log level from environment or defaults
// We can't import the config here due to circular dependency
const getLogLevel = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
};

const isProduction = process.env.NODE_ENV === 'production';

const logger = winston.createLogger({
  level: getLogLevel(),
  // Jest sets NODE_ENV=test; keep test output clean unless asked for
  silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'timeline-mailer', pid: process.pid },
  transports: []
});

if (process.env.LOG_DIR) {
  logger.add(new winston.transports.File({
    filename: path.join(process.env.LOG_DIR, 'error.log'),
    level: 'error'
  }));
  logger.add(new winston.transports.File({
    filename: path.join(process.env.LOG_DIR, 'combined.log')
  }));
}

// Scheduled runs only surface problems on the console
logger.add(new winston.transports.Console({
  level: isProduction ? 'warn' : undefined,
  stderrLevels: ['error', 'warn'],
  format: isProduction
    ? winston.format.json()
    : winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
}));

export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) {
    return;
  }
  logger.level = level;
}

export default logger;
