// src/utils/log-config-loader.ts
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { LoggingConfig } from '../types/config.types';
import { Logger } from './logger';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const LoggingProfileSchema = z.object({
  appendTimestamp: z.boolean(),
  timestampFormat: z.string(),
  logLevel: LogLevelSchema,
  enableWarningLog: z.boolean(),
  logDirectory: z.string()
});

const LoggingConfigSchema = LoggingProfileSchema.partial().extend({
  profile: z.string().optional(),
  profiles: z.record(LoggingProfileSchema).optional()
});

/**
 * Load logging configuration from config/log-config.json under the working
 * directory. Falls back to the given config when the file is absent or invalid.
 */
export function loadLoggingConfig(fallbackConfig?: LoggingConfig): LoggingConfig | undefined {
  const logConfigPath = path.join(process.cwd(), 'config', 'log-config.json');

  try {
    if (fs.existsSync(logConfigPath)) {
      const configContent = fs.readFileSync(logConfigPath, 'utf-8');
      return LoggingConfigSchema.parse(JSON.parse(configContent));
    }
  } catch (error) {
    console.warn(`Failed to load log-config.json: ${error}`);
  }

  return fallbackConfig;
}

/**
 * Initialize the shared logger from log-config.json, or the fallback.
 * Called at the start of every CLI command.
 */
export function initializeLogger(fallbackConfig?: LoggingConfig): void {
  const loggingConfig = loadLoggingConfig(fallbackConfig);

  if (loggingConfig) {
    Logger.initialize(loggingConfig);
    new Logger('LogConfigLoader').debug(`Initialized logger with profile: ${loggingConfig.profile || 'default'}`);
  }
}
