// Logger
// Shared winston logger; components prefix messages with their name in brackets

import winston from 'winston';

const { combine, timestamp, errors, splat, printf } = winston.format;

const lineFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const base = `${ts} [${level.toUpperCase()}] ${message}`;
  return typeof stack === 'string' ? `${base}\n${stack}` : base;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: combine(timestamp(), errors({ stack: true }), splat(), lineFormat),
  transports: [new winston.transports.Console()],
});

if (process.env.LOG_FILE) {
  logger.add(new winston.transports.File({ filename: process.env.LOG_FILE }));
}

export default logger;
