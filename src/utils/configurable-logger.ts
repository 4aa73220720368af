// src/utils/configurable-logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig, LoggingProfile } from '../types/config.types';

const DEFAULT_PROFILES: { [key: string]: LoggingProfile } = {
  Default: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  AppendDatetime: {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  }
};

const lineFormat = winston.format.printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

export class ConfigurableLogger {
  private static config: LoggingProfile = DEFAULT_PROFILES.Default;

  /**
   * Build a winston logger with console output plus combined, error and
   * (optionally) warning log files under the profile's log directory.
   */
  static initialize(config?: LoggingConfig): winston.Logger {
    const profile = this.resolveConfig(config);
    this.config = profile;

    const logger = winston.createLogger({
      level: profile.logLevel,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), lineFormat)
        })
      ]
    });

    const logsDir = path.join(process.cwd(), profile.logDirectory);
    try {
      fs.mkdirSync(logsDir, { recursive: true });
    } catch (error) {
      console.warn(`Could not create logs directory ${logsDir}, using console only: ${error}`);
      return logger;
    }

    const files = this.getLogFiles();
    logger.add(new winston.transports.File({
      filename: path.join(logsDir, files.combined),
      format: winston.format.combine(winston.format.timestamp(), lineFormat)
    }));
    logger.add(new winston.transports.File({
      filename: path.join(logsDir, files.error),
      level: 'error',
      format: winston.format.combine(winston.format.timestamp(), lineFormat)
    }));
    if (files.warning) {
      logger.add(new winston.transports.File({
        filename: path.join(logsDir, files.warning),
        level: 'warn',
        format: winston.format.combine(winston.format.timestamp(), lineFormat)
      }));
    }

    return logger;
  }

  static resolveConfig(config?: LoggingConfig): LoggingProfile {
    if (!config) {
      return DEFAULT_PROFILES.AppendDatetime;
    }

    if (config.profile) {
      const custom = config.profiles?.[config.profile];
      if (custom) {
        return custom;
      }
      const builtIn = DEFAULT_PROFILES[config.profile];
      if (builtIn) {
        return builtIn;
      }
      console.warn(`Logging profile '${config.profile}' not found, using AppendDatetime`);
      return DEFAULT_PROFILES.AppendDatetime;
    }

    if (config.appendTimestamp !== undefined) {
      return {
        appendTimestamp: config.appendTimestamp,
        timestampFormat: config.timestampFormat || 'YYYY-MM-DD-HHmmss',
        logLevel: config.logLevel || 'info',
        enableWarningLog: config.enableWarningLog !== false,
        logDirectory: config.logDirectory || 'logs'
      };
    }

    return DEFAULT_PROFILES.AppendDatetime;
  }

  static generateLogFilename(baseName: string, profile: LoggingProfile, now: Date = new Date()): string {
    if (!profile.appendTimestamp) {
      return baseName;
    }

    let timestamp: string;
    if (profile.timestampFormat === 'YYYY-MM-DD-HHmmss') {
      const pad = (n: number) => String(n).padStart(2, '0');
      timestamp = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}-` +
        `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    } else {
      timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, -5);
    }

    const ext = path.extname(baseName);
    const name = path.basename(baseName, ext);
    return `${name}-${timestamp}${ext}`;
  }

  static getLogFiles(): { combined: string; error: string; warning?: string } {
    const result: { combined: string; error: string; warning?: string } = {
      combined: this.generateLogFilename('combined.log', this.config),
      error: this.generateLogFilename('error.log', this.config)
    };
    if (this.config.enableWarningLog) {
      result.warning = this.generateLogFilename('warning.log', this.config);
    }
    return result;
  }

  static getLogFilePaths(): { combined: string; error: string; warning?: string } {
    const files = this.getLogFiles();
    const logsDir = path.join(process.cwd(), this.config.logDirectory);
    return {
      combined: path.join(logsDir, files.combined),
      error: path.join(logsDir, files.error),
      warning: files.warning ? path.join(logsDir, files.warning) : undefined
    };
  }
}

export function createLogger(config?: LoggingConfig): winston.Logger {
  return ConfigurableLogger.initialize(config);
}
