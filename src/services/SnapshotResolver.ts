// src/services/SnapshotResolver.ts
import { CatalogDate, SnapshotDictionary } from '../types/catalog.types';
import { NoApplicableSnapshotError } from '../utils/errors';

/**
 * Version key of the most recent snapshot <= catalog date.
 * Versions are YYYY-MM, so string order is date order.
 */
export function pickSnapshotVersion(catalogDate: CatalogDate, snapshots: SnapshotDictionary): string {
  let chosen: string | null = null;
  for (const version of Object.keys(snapshots).sort()) {
    if (version <= catalogDate) {
      chosen = version;
    }
  }
  if (chosen === null) {
    throw new NoApplicableSnapshotError(catalogDate);
  }
  return chosen;
}

export function pickSnapshot(catalogDate: CatalogDate, snapshots: SnapshotDictionary): readonly string[] {
  return snapshots[pickSnapshotVersion(catalogDate, snapshots)];
}
