// src/utils/logger.ts
import * as winston from 'winston';
import { ConfigurableLogger, createLogger } from './configurable-logger';
import { LoggingConfig } from '../types/config.types';

// Console-only until Logger.initialize() attaches the configured file transports
const logger: winston.Logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.simple()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp }) => {
          return `${timestamp} [${level}]: ${message}`;
        })
      )
    })
  ]
});

export default logger;
export { logger };

// Context-tagged wrapper used by the parsers and services
export class Logger {
  private context: string;
  static globalConfig: LoggingConfig | undefined;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Swap the shared logger's transports for the ones the config describes.
   * Call once at startup, before any work is logged.
   */
  static initialize(config: LoggingConfig): void {
    Logger.globalConfig = config;
    const configured = createLogger(config);

    logger.clear();
    configured.transports.forEach(transport => {
      logger.add(transport);
    });
    logger.level = configured.level;
    logger.format = configured.format;
  }

  info(message: string): void {
    logger.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    logger.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      logger.error(`[${this.context}] ${message}: ${error.message}`);
    } else if (error !== undefined) {
      logger.error(`[${this.context}] ${message}: ${String(error)}`);
    } else {
      logger.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    logger.debug(`[${this.context}] ${message}`);
  }

  setLevel(level: string): void {
    logger.level = level;
  }
}

export function getLogFilePaths(): { combined: string; error: string; warning?: string } | null {
  if (Logger.globalConfig) {
    return ConfigurableLogger.getLogFilePaths();
  }
  return null;
}
