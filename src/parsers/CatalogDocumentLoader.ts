// src/parsers/CatalogDocumentLoader.ts
import * as fs from 'fs';
import * as path from 'path';
import { isValid, parse } from 'date-fns';
import { CatalogDate, CatalogDocument } from '../types/catalog.types';
import { InvalidCatalogFileNameError } from '../utils/errors';
import { FileHelpers } from '../utils/file-helpers';

const CATALOG_FILE_PATTERN = /^catalog_(\d{4})_(\d{2})\.txt$/;

/**
 * "catalog_2018_07.txt" -> "2018-07"
 */
export function parseCatalogFileName(fileName: string): CatalogDate {
  const match = path.basename(fileName).match(CATALOG_FILE_PATTERN);
  if (!match) {
    throw new InvalidCatalogFileNameError(fileName);
  }

  const catalogDate = `${match[1]}-${match[2]}`;
  if (!isValid(parse(catalogDate, 'yyyy-MM', new Date(2000, 0, 1)))) {
    throw new InvalidCatalogFileNameError(fileName);
  }
  return catalogDate;
}

export function catalogDatePrefix(catalogDate: CatalogDate): string {
  return catalogDate.replace('-', '_');
}

export function createCatalogDocument(fileName: string, text: string): CatalogDocument {
  const lines = text.split(/\r?\n/).map(line => line.trim());
  // A trailing newline is not a line of its own
  if (lines.length > 0 && lines[lines.length - 1] === '' && /\n$/.test(text)) {
    lines.pop();
  }

  return Object.freeze({
    catalogDate: parseCatalogFileName(fileName),
    fileName: path.basename(fileName),
    lines: Object.freeze(lines)
  });
}

export function loadCatalogDocument(filePath: string): CatalogDocument {
  return createCatalogDocument(filePath, fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Text files in the directory, sorted by name. Sorted file order is the
 * scan order that decides each course's canonical title.
 */
export function listCatalogFiles(textDir: string): string[] {
  return FileHelpers.getFiles(textDir, /\.txt$/);
}
