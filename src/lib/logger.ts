import winston from "winston";

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(
  ({ level, message, timestamp, stack }) => `${String(timestamp)} [${level}] ${String(stack ?? message)}`
);

export type Logger = winston.Logger;

export function createLogger(options: { level?: string; silent?: boolean } = {}): Logger {
  return winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? "info",
    silent: options.silent ?? false,
    format: combine(errors({ stack: true }), timestamp(), logFormat),
    transports: [
      new winston.transports.Console({
        format: combine(colorize(), timestamp(), logFormat)
      })
    ]
  });
}

export const logger = createLogger();
