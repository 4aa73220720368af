// src/utils/errors.ts
import { CatalogDate } from '../types/catalog.types';

/**
 * Base class for every failure the catalog pipeline raises.
 * Fatal errors abort the whole run; the rest skip one file or one degree.
 */
export abstract class CatalogError extends Error {
  abstract readonly code: string;
  abstract readonly fatal: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NoApplicableSnapshotError extends CatalogError {
  readonly code = 'NO_APPLICABLE_SNAPSHOT';
  readonly fatal = true;

  constructor(readonly catalogDate: CatalogDate) {
    super(`No snapshot version found for ${catalogDate}`);
  }
}

export class MissingSectionAnchorError extends CatalogError {
  readonly code = 'MISSING_SECTION_ANCHOR';
  readonly fatal = false;

  constructor(readonly catalogDate: CatalogDate, detail: string) {
    super(`${catalogDate}: ${detail}`);
  }
}

export class NoEnclosingCollegeError extends CatalogError {
  readonly code = 'NO_ENCLOSING_COLLEGE';
  readonly fatal = false;

  constructor(readonly catalogDate: CatalogDate, readonly ccnLine: number) {
    super(`${catalogDate}: no college header found above CCN header at line ${ccnLine}`);
  }
}

export class DuplicateCertificateError extends CatalogError {
  readonly code = 'DUPLICATE_CERTIFICATE';
  readonly fatal = true;

  constructor(readonly catalogDate: CatalogDate, readonly overlap: string[]) {
    super(`Overlapping certificates in ${catalogDate}: ${overlap.join(', ')}`);
  }
}

export class MissingCollegeError extends CatalogError {
  readonly code = 'MISSING_COLLEGE';
  readonly fatal = true;

  constructor(readonly catalogDate: CatalogDate, readonly college: string) {
    super(`Missing expected college '${college}' in ${catalogDate}`);
  }
}

export class UnrecognizedDuplicatesFormatError extends CatalogError {
  readonly code = 'UNRECOGNIZED_DUPLICATES_FORMAT';
  readonly fatal = true;

  constructor(readonly source: string) {
    super(
      `Unrecognized degree duplicates format in ${source}: expected an object of raw -> resolved names ` +
      `or a list of {raw_degree_name, resolved_name}`
    );
  }
}

export class InvalidConfigError extends CatalogError {
  readonly code = 'INVALID_CONFIG';
  readonly fatal = true;
}

export class InvalidCatalogFileNameError extends CatalogError {
  readonly code = 'INVALID_CATALOG_FILE_NAME';
  readonly fatal = false;

  constructor(readonly fileName: string) {
    super(`Not a catalog file name (expected catalog_<YYYY>_<MM>.txt): ${fileName}`);
  }
}

export function isFatal(error: unknown): boolean {
  return !(error instanceof CatalogError) || error.fatal;
}
