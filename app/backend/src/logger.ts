import winston from 'winston';

const level = process.env.LOG_LEVEL ?? (process.env.VITEST ? 'error' : 'info');

export const logger = winston.createLogger({
  level,
  transports: [new winston.transports.Console()],
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(
      ({ level: lvl, message, timestamp }) => `[${String(timestamp)}] ${lvl}: ${String(message)}`
    )
  ),
});

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
