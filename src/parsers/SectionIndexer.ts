// src/parsers/SectionIndexer.ts
import { isCcnHeader, isCollegeHeading, isFooter } from '../config/patterns';
import {
  CatalogDate,
  CatalogDocument,
  ProgramNameListing,
  Section,
  SectionFailure,
  SectionRef,
  StopFenceMode
} from '../types/catalog.types';
import { MissingSectionAnchorError, NoEnclosingCollegeError } from '../utils/errors';
import { Logger } from '../utils/logger';

export type SectionsIndexJson = Record<CatalogDate, Record<string, Record<string, [number, number]>>>;

/**
 * Accumulates date -> college -> degree -> section across a run.
 * Only the Section Indexer holds one; everyone else reads entries().
 */
export class SectionsIndexBuilder {
  private index = new Map<CatalogDate, Map<string, Map<string, Section>>>();

  insert(ref: SectionRef, lineCount: number): void {
    const { startLine, stopLine } = ref.section;
    if (!(startLine >= 0 && startLine < stopLine && stopLine <= lineCount)) {
      throw new RangeError(
        `Invalid section [${startLine}, ${stopLine}) for ${ref.catalogDate} / ${ref.college} / ${ref.degree} ` +
        `in a ${lineCount}-line catalog`
      );
    }

    let colleges = this.index.get(ref.catalogDate);
    if (!colleges) {
      colleges = new Map();
      this.index.set(ref.catalogDate, colleges);
    }
    let degrees = colleges.get(ref.college);
    if (!degrees) {
      degrees = new Map();
      colleges.set(ref.college, degrees);
    }
    degrees.set(ref.degree, { startLine, stopLine });
  }

  get(catalogDate: CatalogDate, college: string, degree: string): Section | undefined {
    return this.index.get(catalogDate)?.get(college)?.get(degree);
  }

  /**
   * Sections in insertion order, optionally limited to one catalog date
   */
  *entries(catalogDate?: CatalogDate): IterableIterator<SectionRef> {
    for (const [date, colleges] of this.index) {
      if (catalogDate !== undefined && date !== catalogDate) continue;
      for (const [college, degrees] of colleges) {
        for (const [degree, section] of degrees) {
          yield { catalogDate: date, college, degree, section: { ...section } };
        }
      }
    }
  }

  dates(): CatalogDate[] {
    return Array.from(this.index.keys());
  }

  toJSON(): SectionsIndexJson {
    const json: SectionsIndexJson = {};
    for (const [date, colleges] of this.index) {
      json[date] = {};
      for (const [college, degrees] of colleges) {
        json[date][college] = {};
        for (const [degree, section] of degrees) {
          json[date][college][degree] = [section.startLine, section.stopLine];
        }
      }
    }
    return json;
  }
}

export interface SectionIndexResult {
  sections: SectionRef[];
  failures: SectionFailure[];
}

/**
 * Maps each (date, college, degree) to the half-open line interval holding
 * its course listing.
 */
export class SectionIndexer {
  private logger: Logger;
  private builder: SectionsIndexBuilder;
  private stopFence: StopFenceMode;

  constructor(builder: SectionsIndexBuilder, stopFence: StopFenceMode = 'strict', logger?: Logger) {
    this.builder = builder;
    this.stopFence = stopFence;
    this.logger = logger ?? new Logger('SectionIndexer');
  }

  /**
   * Heading-driven indexing: one section per listed degree. Degrees whose
   * heading or CCN header cannot be found are reported and skipped.
   */
  indexByHeadings(document: CatalogDocument, listing: ProgramNameListing): SectionIndexResult {
    const result: SectionIndexResult = { sections: [], failures: [] };
    const collegeKeys = new Set(listing.programNames.keys());

    for (const [college, degrees] of listing.programNames) {
      for (const degree of degrees) {
        try {
          const section = this.findDegreeSection(document, degree, degrees, collegeKeys, listing.listingLines);
          const ref: SectionRef = { catalogDate: document.catalogDate, college, degree, section };
          this.builder.insert(ref, document.lines.length);
          result.sections.push(ref);
          this.logger.debug(`${degree} at lines ${section.startLine}-${section.stopLine}`);
        } catch (error) {
          if (!(error instanceof MissingSectionAnchorError)) throw error;
          this.logger.warn(error.message);
          result.failures.push({ catalogDate: document.catalogDate, college, degree, reason: error.message });
        }
      }
    }

    this.logger.info(
      `${document.catalogDate}: ${result.sections.length} sections indexed, ${result.failures.length} issues`
    );
    return result;
  }

  /**
   * Fallback for catalogs without a program-name listing: walk up from the
   * first CCN header to the enclosing college and take the next line as the
   * degree name. Yields at most one section.
   */
  indexByUpwardScan(document: CatalogDocument, validColleges: readonly string[]): SectionRef {
    const { lines, catalogDate } = document;

    const firstCcn = lines.findIndex(isCcnHeader);
    if (firstCcn < 0) {
      throw new MissingSectionAnchorError(catalogDate, 'no CCN header found');
    }

    let college: string | null = null;
    let collegeLine = -1;
    for (let j = firstCcn; j >= 0 && college === null; j--) {
      const line = lines[j];
      if (validColleges.includes(line)) {
        college = line;
      } else {
        college = validColleges.find(name => line.startsWith(name)) ?? null;
      }
      if (college !== null) {
        collegeLine = j;
        this.logger.debug(`${catalogDate}: college '${college}' at line ${j}: '${line}'`);
      }
    }
    if (college === null) {
      throw new NoEnclosingCollegeError(catalogDate, firstCcn);
    }

    let degree: string | null = null;
    let degreeLine = -1;
    for (let i = collegeLine + 1; i < lines.length; i++) {
      if (lines[i] && !isCollegeHeading(lines[i])) {
        degree = lines[i];
        degreeLine = i;
        break;
      }
    }
    if (degree === null) {
      throw new MissingSectionAnchorError(catalogDate, `no degree line after college '${college}'`);
    }

    const startLine = this.findNext(lines, degreeLine, isCcnHeader);
    if (startLine < 0) {
      throw new MissingSectionAnchorError(catalogDate, `no CCN header after degree '${degree}'`);
    }

    let stopLine = lines.length;
    for (let k = startLine + 1; k < lines.length; k++) {
      if (isCollegeHeading(lines[k]) || isFooter(lines[k])) {
        stopLine = k;
        break;
      }
    }

    const ref: SectionRef = { catalogDate, college, degree, section: { startLine, stopLine } };
    this.builder.insert(ref, lines.length);
    this.logger.info(`${catalogDate}: upward scan found '${degree}' under '${college}' at lines ${startLine}-${stopLine}`);
    return ref;
  }

  private findDegreeSection(
    document: CatalogDocument,
    degree: string,
    siblings: readonly string[],
    collegeKeys: ReadonlySet<string>,
    listingLines: ReadonlySet<number>
  ): Section {
    const { lines, catalogDate } = document;

    const headingLine = this.findHeading(lines, degree, listingLines);
    if (headingLine < 0) {
      throw new MissingSectionAnchorError(catalogDate, `heading not found: ${degree}`);
    }

    const startLine = this.findNext(lines, headingLine, isCcnHeader);
    if (startLine < 0) {
      throw new MissingSectionAnchorError(catalogDate, `CCN header not found after heading: ${degree}`);
    }

    let stopLine = lines.length;
    for (let k = startLine + 1; k < lines.length; k++) {
      if (this.isStopFence(lines[k], degree, siblings, collegeKeys)) {
        stopLine = k;
        break;
      }
    }
    return { startLine, stopLine };
  }

  private isStopFence(line: string, degree: string, siblings: readonly string[], collegeKeys: ReadonlySet<string>): boolean {
    if (line !== degree && siblings.includes(line)) return true;
    if (this.stopFence === 'strict' && collegeKeys.has(line)) return true;
    return isFooter(line);
  }

  /**
   * First exact occurrence of the degree name that is not the front-matter
   * listing entry itself; the listing entry when no other occurrence exists.
   */
  private findHeading(lines: readonly string[], degree: string, listingLines: ReadonlySet<number>): number {
    let listed = -1;
    for (let i = 0; i < lines.length; i++) {
      if (lines[i] !== degree) continue;
      if (!listingLines.has(i)) return i;
      if (listed < 0) listed = i;
    }
    return listed;
  }

  private findNext(lines: readonly string[], from: number, predicate: (line: string) => boolean): number {
    for (let i = from; i < lines.length; i++) {
      if (predicate(lines[i])) return i;
    }
    return -1;
  }
}
