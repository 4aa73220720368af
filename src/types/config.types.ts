// src/types/config.types.ts
import { DuplicatesMap, SnapshotDictionary, StopFenceMode } from './catalog.types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingProfile {
  appendTimestamp: boolean;
  timestampFormat: string;
  logLevel: LogLevel;
  enableWarningLog: boolean;
  logDirectory: string;
}

export interface LoggingConfig extends Partial<LoggingProfile> {
  profile?: string;
  profiles?: { [key: string]: LoggingProfile };
}

export interface CatalogPaths {
  textDir: string;
  outputDir: string;
  snapshotsFile: string;
  canonicalOrderFile?: string;
  duplicatesFile: string;
}

export interface CatalogOptions {
  stopFence: StopFenceMode;
  reuseProgramNames: boolean;
}

export interface CatalogConfig {
  readonly paths: Readonly<CatalogPaths>;
  readonly options: Readonly<CatalogOptions>;
  // Valid college lists per snapshot version
  readonly collegeSnapshots: SnapshotDictionary;
  // Canonical college ordering per snapshot version
  readonly canonicalCollegeOrder: SnapshotDictionary;
  readonly degreeDuplicates: DuplicatesMap;
}
