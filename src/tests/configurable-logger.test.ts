// src/tests/configurable-logger.test.ts
import { ConfigurableLogger } from '../utils/configurable-logger';

describe('ConfigurableLogger', () => {
  const profile = {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info' as const,
    enableWarningLog: true,
    logDirectory: 'logs'
  };

  describe('resolveConfig', () => {
    it('should prefer a custom profile from the config', () => {
      const custom = { ...profile, logLevel: 'debug' as const };

      expect(ConfigurableLogger.resolveConfig({ profile: 'Debug', profiles: { Debug: custom } })).toEqual(custom);
    });

    it('should fall back to the built-in profile of the same name', () => {
      expect(ConfigurableLogger.resolveConfig({ profile: 'Default' }).appendTimestamp).toBe(false);
    });
  });

  describe('generateLogFilename', () => {
    it('should keep the base name when timestamps are off', () => {
      expect(ConfigurableLogger.generateLogFilename('combined.log', { ...profile, appendTimestamp: false }))
        .toBe('combined.log');
    });

    it('should append a local timestamp before the extension', () => {
      const now = new Date(2024, 5, 3, 9, 5, 7);

      expect(ConfigurableLogger.generateLogFilename('error.log', profile, now)).toBe('error-2024-06-03-090507.log');
    });
  });
});
