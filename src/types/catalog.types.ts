// src/types/catalog.types.ts
import { PatternId } from './patterns.types';

// Catalog date in YYYY-MM form, e.g. "2018-07"
export type CatalogDate = string;

export interface CatalogDocument {
  catalogDate: CatalogDate;
  fileName: string;
  lines: readonly string[];
}

// Version key (YYYY-MM) -> ordered college names
export type SnapshotDictionary = Readonly<Record<string, readonly string[]>>;

export type DuplicatesMap = ReadonlyMap<string, string>;

// college -> ordered raw degree names, in listing order
export type ProgramNames = Map<string, string[]>;

export interface ProgramNameListing {
  catalogDate: CatalogDate;
  programNames: ProgramNames;
  // Line numbers of every listed name in the front matter
  listingLines: Set<number>;
}

export interface Section {
  startLine: number;  // CCN header line, inclusive
  stopLine: number;   // exclusive
}

export interface SectionRef {
  catalogDate: CatalogDate;
  college: string;
  degree: string;
  section: Section;
}

export type StopFenceMode = 'strict' | 'sibling-only';

export type IndexingStrategy = 'heading' | 'upward-scan';

export interface SectionFailure {
  catalogDate: CatalogDate;
  college?: string;
  degree?: string;
  reason: string;
}

export interface CourseInstance {
  catalogDate: CatalogDate;
  college: string;
  degree: string;
  pattern: PatternId;
  raw: string;
}

export interface CourseIndexEntry {
  canonicalTitle: string;
  canonicalCreditUnits: number;
  instances: CourseInstance[];
}

export type AnomalyKind = 'UNMATCHED' | 'NO_CODE';

export interface Anomaly {
  catalogDate: CatalogDate;
  college: string;
  degree: string;
  kind: AnomalyKind;
  raw: string;
}

// college -> sorted unique canonical degree names, in canonical college order
export type DegreeSnapshot = Map<string, string[]>;

export const CERTIFICATES_BUCKET = 'Certificates - Standard Paths';
