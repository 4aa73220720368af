// src/parsers/ProgramNameExtractor.ts
import {
  ANCHORS,
  PROGRAM_LISTING_TERMINATORS,
  PROGRAM_TITLE_EXCLUDE_PATTERN,
  isCcnHeader
} from '../config/patterns';
import { CatalogDocument, ProgramNameListing, ProgramNames } from '../types/catalog.types';
import { Logger } from '../utils/logger';

interface BufferedName {
  name: string;
  lineNumber: number;
}

/**
 * Reads the front matter (everything above the first CCN header) and lists
 * the degree names printed under each college heading.
 */
export class ProgramNameExtractor {
  private logger: Logger;

  constructor(logger: Logger = new Logger('ProgramNameExtractor')) {
    this.logger = logger;
  }

  extract(document: CatalogDocument, validColleges: readonly string[] = []): ProgramNameListing {
    const programNames: ProgramNames = new Map();
    const listingLines = new Set<number>();
    const listing: ProgramNameListing = { catalogDate: document.catalogDate, programNames, listingLines };

    const firstCcn = document.lines.findIndex(isCcnHeader);
    if (firstCcn < 0) {
      this.logger.warn(`${document.catalogDate}: no CCN header, no front matter to read`);
      return listing;
    }

    const collegeNames = new Set(validColleges);
    let currentCollege: string | null = null;
    let buffer: BufferedName[] = [];
    let collecting = false;

    const flush = (): void => {
      if (currentCollege && buffer.length > 0) {
        const names = programNames.get(currentCollege) ?? [];
        for (const entry of buffer) {
          if (!names.includes(entry.name)) {
            names.push(entry.name);
          }
          listingLines.add(entry.lineNumber);
        }
        programNames.set(currentCollege, names);
      }
      buffer = [];
    };

    for (let i = 0; i < firstCcn; i++) {
      const line = document.lines[i];
      if (!line) continue;

      if (ANCHORS.SCHOOL_OF.test(line) || collegeNames.has(line)) {
        flush();
        currentCollege = line;
        collecting = true;
        continue;
      }

      if (PROGRAM_LISTING_TERMINATORS.some(pattern => pattern.test(line))) {
        flush();
        currentCollege = null;
        collecting = false;
        continue;
      }

      if (collecting && !PROGRAM_TITLE_EXCLUDE_PATTERN.test(line)) {
        buffer.push({ name: line, lineNumber: i });
      }
    }
    flush();

    const total = Array.from(programNames.values()).reduce((sum, names) => sum + names.length, 0);
    this.logger.debug(`${document.catalogDate}: ${programNames.size} colleges, ${total} program names`);
    return listing;
  }

  /**
   * Rebuild a listing from previously saved program names. Listing lines are
   * the front-matter lines that repeat a saved name exactly.
   */
  restore(document: CatalogDocument, programNames: ProgramNames): ProgramNameListing {
    const listingLines = new Set<number>();
    const names = new Set(Array.from(programNames.values()).flat());
    const firstCcn = document.lines.findIndex(isCcnHeader);
    const end = firstCcn < 0 ? 0 : firstCcn;

    for (let i = 0; i < end; i++) {
      if (names.has(document.lines[i])) {
        listingLines.add(i);
      }
    }
    this.logger.debug(`${document.catalogDate}: restored ${names.size} program names from cache`);
    return { catalogDate: document.catalogDate, programNames, listingLines };
  }
}
