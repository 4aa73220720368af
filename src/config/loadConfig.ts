// src/config/loadConfig.ts
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DuplicatesMap, SnapshotDictionary } from '../types/catalog.types';
import { CatalogConfig, CatalogOptions, CatalogPaths } from '../types/config.types';
import { InvalidConfigError, UnrecognizedDuplicatesFormatError } from '../utils/errors';
import { FileHelpers } from '../utils/file-helpers';

const DEFAULT_PATHS: CatalogPaths = {
  textDir: './data/raw_catalog_texts',
  outputDir: './outputs',
  snapshotsFile: './shared/college_snapshots.json',
  duplicatesFile: './shared/degree_duplicates_master.json'
};

const DEFAULT_OPTIONS: CatalogOptions = {
  stopFence: 'strict',
  reuseProgramNames: false
};

export const DEFAULT_CONFIG_FILE = path.join('config', 'catalog-config.json');

const StopFenceSchema = z.enum(['strict', 'sibling-only']);

const SnapshotDictionarySchema = z.record(
  z.string().regex(/^\d{4}-\d{2}$/, 'snapshot versions must be YYYY-MM'),
  z.array(z.string())
);

const FlatDuplicatesSchema = z.record(z.string());

const DuplicatesListSchema = z.array(z.object({
  raw_degree_name: z.string(),
  resolved_name: z.string()
}));

const CatalogConfigFileSchema = z.object({
  textDir: z.string(),
  outputDir: z.string(),
  snapshotsFile: z.string(),
  canonicalOrderFile: z.string(),
  duplicatesFile: z.string(),
  stopFence: StopFenceSchema,
  reuseProgramNames: z.boolean()
}).partial();

export type CatalogConfigFile = z.infer<typeof CatalogConfigFileSchema>;

export interface CatalogSettingsOverrides extends Partial<CatalogPaths>, Partial<CatalogOptions> {
  configFile?: string;
}

export interface CatalogSettings {
  paths: CatalogPaths;
  options: CatalogOptions;
}

/**
 * Accepts {raw: resolved, ...} or [{raw_degree_name, resolved_name}, ...]
 * and returns a trimmed raw -> resolved map.
 */
export function normalizeDuplicates(raw: unknown, source: string): Map<string, string> {
  const flat = FlatDuplicatesSchema.safeParse(raw);
  if (flat.success && !Array.isArray(raw)) {
    return new Map(Object.entries(flat.data).map(([from, to]) => [from.trim(), to.trim()]));
  }

  const list = DuplicatesListSchema.safeParse(raw);
  if (list.success) {
    const duplicates = new Map<string, string>();
    for (const entry of list.data) {
      const resolved = entry.resolved_name.trim();
      if (resolved) {
        duplicates.set(entry.raw_degree_name.trim(), resolved);
      }
    }
    return duplicates;
  }

  throw new UnrecognizedDuplicatesFormatError(source);
}

export function parseSnapshotDictionary(raw: unknown, source: string): SnapshotDictionary {
  const parsed = SnapshotDictionarySchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(`Invalid college snapshots in ${source}: ${parsed.error.issues[0]?.message}`);
  }
  return Object.freeze(parsed.data);
}

function readJson(filePath: string, label: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new InvalidConfigError(`${label} not found: ${filePath}`);
  }
  try {
    return FileHelpers.readJsonFile(filePath);
  } catch (error) {
    throw new InvalidConfigError(`${label} is not valid JSON: ${filePath} (${error})`);
  }
}

export function loadConfigFile(configFile: string): CatalogConfigFile {
  const parsed = CatalogConfigFileSchema.safeParse(readJson(configFile, 'Configuration file'));
  if (!parsed.success) {
    throw new InvalidConfigError(`Invalid configuration file ${configFile}: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}

function envStopFence(value: string | undefined): CatalogOptions['stopFence'] | undefined {
  if (value === undefined) return undefined;
  const parsed = StopFenceSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidConfigError(`CATALOG_STOP_FENCE must be 'strict' or 'sibling-only', got '${value}'`);
  }
  return parsed.data;
}

/**
 * Settle paths and options: overrides (CLI flags) first, then environment,
 * then the JSON config file, then defaults. Relative paths resolve against cwd.
 */
export function resolveCatalogSettings(
  overrides: CatalogSettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): CatalogSettings {
  let fileConfig: CatalogConfigFile = {};
  if (overrides.configFile) {
    fileConfig = loadConfigFile(path.resolve(overrides.configFile));
  } else if (fs.existsSync(path.resolve(DEFAULT_CONFIG_FILE))) {
    fileConfig = loadConfigFile(path.resolve(DEFAULT_CONFIG_FILE));
  }

  const pick = (key: keyof CatalogPaths, envName: string): string | undefined =>
    overrides[key] ?? env[envName] ?? fileConfig[key] ?? DEFAULT_PATHS[key];

  const canonicalOrderFile = pick('canonicalOrderFile', 'CATALOG_CANONICAL_ORDER_FILE');
  const paths: CatalogPaths = {
    textDir: path.resolve(pick('textDir', 'CATALOG_TEXT_DIR') ?? DEFAULT_PATHS.textDir),
    outputDir: path.resolve(pick('outputDir', 'CATALOG_OUTPUT_DIR') ?? DEFAULT_PATHS.outputDir),
    snapshotsFile: path.resolve(pick('snapshotsFile', 'CATALOG_SNAPSHOTS_FILE') ?? DEFAULT_PATHS.snapshotsFile),
    canonicalOrderFile: canonicalOrderFile ? path.resolve(canonicalOrderFile) : undefined,
    duplicatesFile: path.resolve(pick('duplicatesFile', 'CATALOG_DUPLICATES_FILE') ?? DEFAULT_PATHS.duplicatesFile)
  };

  const options: CatalogOptions = {
    stopFence: overrides.stopFence ?? envStopFence(env.CATALOG_STOP_FENCE) ?? fileConfig.stopFence ?? DEFAULT_OPTIONS.stopFence,
    reuseProgramNames: overrides.reuseProgramNames ?? fileConfig.reuseProgramNames ?? DEFAULT_OPTIONS.reuseProgramNames
  };

  return { paths, options };
}

/**
 * Read the snapshot and duplicates files once and return the immutable
 * configuration every component receives. No other module reads them.
 */
export function loadConfig(paths: CatalogPaths, options: Partial<CatalogOptions> = {}): CatalogConfig {
  const collegeSnapshots = parseSnapshotDictionary(
    readJson(paths.snapshotsFile, 'College snapshots file'),
    paths.snapshotsFile
  );
  const canonicalCollegeOrder = paths.canonicalOrderFile
    ? parseSnapshotDictionary(readJson(paths.canonicalOrderFile, 'Canonical college order file'), paths.canonicalOrderFile)
    : collegeSnapshots;
  const degreeDuplicates: DuplicatesMap = normalizeDuplicates(
    readJson(paths.duplicatesFile, 'Degree duplicates file'),
    paths.duplicatesFile
  );

  return Object.freeze({
    paths: Object.freeze({ ...paths }),
    options: Object.freeze({ ...DEFAULT_OPTIONS, ...options }),
    collegeSnapshots,
    canonicalCollegeOrder,
    degreeDuplicates
  });
}
