// src/services/DegreeSnapshotBuilder.ts
import {
  CERTIFICATES_BUCKET,
  CatalogDate,
  DegreeSnapshot,
  DuplicatesMap,
  ProgramNames
} from '../types/catalog.types';
import { DuplicateCertificateError, MissingCollegeError } from '../utils/errors';
import { Logger } from '../utils/logger';

export type DegreeSnapshotsJson = Record<CatalogDate, Record<string, string[]>>;

export function resolveDegreeName(rawName: string, duplicates: DuplicatesMap): string {
  const name = rawName.trim();
  return (duplicates.get(name) ?? name).trim();
}

function sortedUnique(names: Iterable<string>): string[] {
  return Array.from(new Set(names)).sort();
}

/**
 * Canonicalizes one catalog's program names into a degree snapshot:
 * aliases resolved, names deduplicated and sorted, colleges emitted in the
 * canonical order of the resolved snapshot version.
 */
export class DegreeSnapshotBuilder {
  private logger: Logger;
  private duplicates: DuplicatesMap;

  constructor(duplicates: DuplicatesMap, logger?: Logger) {
    this.duplicates = duplicates;
    this.logger = logger ?? new Logger('DegreeSnapshotBuilder');
  }

  build(catalogDate: CatalogDate, programNames: ProgramNames, canonicalColleges: readonly string[]): DegreeSnapshot {
    const resolvedByCollege = new Map<string, string[]>();
    const embeddedCertificates = new Set<string>();
    const trailingCertificates: string[] = [];

    for (const [college, rawNames] of programNames) {
      const resolved = rawNames.map(name => resolveDegreeName(name, this.duplicates));

      if (college === CERTIFICATES_BUCKET) {
        trailingCertificates.push(...resolved);
        continue;
      }

      const unique = sortedUnique(resolved);
      resolvedByCollege.set(college, unique);
      unique.filter(name => name.includes('Certificate')).forEach(name => embeddedCertificates.add(name));
    }

    if (trailingCertificates.length > 0) {
      const certificates = sortedUnique(trailingCertificates);
      const overlap = certificates.filter(name => embeddedCertificates.has(name));
      if (overlap.length > 0) {
        throw new DuplicateCertificateError(catalogDate, overlap);
      }
      resolvedByCollege.set(CERTIFICATES_BUCKET, certificates);
    }

    const snapshot: DegreeSnapshot = new Map();
    for (const college of canonicalColleges) {
      const degrees = resolvedByCollege.get(college);
      if (degrees) {
        snapshot.set(college, degrees);
      } else if (college !== CERTIFICATES_BUCKET) {
        throw new MissingCollegeError(catalogDate, college);
      }
    }

    const dropped = Array.from(resolvedByCollege.keys()).filter(college => !snapshot.has(college));
    if (dropped.length > 0) {
      this.logger.warn(`${catalogDate}: colleges not in the canonical order were dropped: ${dropped.join(', ')}`);
    }

    return snapshot;
  }

  static toJSON(snapshots: ReadonlyMap<CatalogDate, DegreeSnapshot>): DegreeSnapshotsJson {
    const json: DegreeSnapshotsJson = {};
    for (const [date, snapshot] of snapshots) {
      json[date] = Object.fromEntries(snapshot);
    }
    return json;
  }
}
