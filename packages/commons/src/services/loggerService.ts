import winston from "winston";

export type LogMeta = Record<string, unknown>;

/** The subset of LoggerService the other components depend on. */
export interface Logger {
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
}

export class LoggerService implements Logger {
  private logger: winston.Logger;

  constructor(serviceName: string, level: string = process.env.LOG_LEVEL || "info") {
    this.logger = winston.createLogger({
      level: level.toLowerCase(),
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : "";
          return `[${timestamp}] [${serviceName}] [${level}]: ${message} ${metaStr}`;
        })
      ),
      transports: [new winston.transports.Console()],
    });
  }

  info(msg: string, meta?: LogMeta) {
    this.logger.info(msg, meta ?? {});
  }

  error(msg: string, meta?: LogMeta) {
    this.logger.error(msg, meta ?? {});
  }

  warn(msg: string, meta?: LogMeta) {
    this.logger.warn(msg, meta ?? {});
  }

  debug(msg: string, meta?: LogMeta) {
    this.logger.debug(msg, meta ?? {});
  }
}
