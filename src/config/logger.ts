import winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';

const consoleFormat = winston.format.printf(({ level, message, timestamp, stack }) => {
  const text = typeof stack === 'string' ? stack : String(message);
  return `${String(timestamp)} ${level}: ${text}`;
});

const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  ),
  transports: [
    new winston.transports.Console({
      format:
        process.env.NODE_ENV === 'production'
          ? winston.format.json()
          : winston.format.combine(winston.format.colorize(), consoleFormat),
      silent: process.env.NODE_ENV === 'test' || process.env.VITEST === 'true',
    }),
  ],
});

export default logger;
