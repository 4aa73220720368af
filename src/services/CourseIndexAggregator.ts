// src/services/CourseIndexAggregator.ts
import { isCcnHeader, isFooter } from '../config/patterns';
import { classifyCourseRow, courseCodeOf } from '../parsers/CourseRowClassifier';
import {
  Anomaly,
  CatalogDate,
  CatalogDocument,
  CourseIndexEntry,
  CourseInstance,
  SectionRef
} from '../types/catalog.types';
import { Logger } from '../utils/logger';

export interface CourseIndexJsonEntry {
  canonical_title: string;
  canonical_cus: number;
  instances: Array<{
    catalog_date: CatalogDate;
    college: string;
    degree: string;
    pattern: string;
    raw: string;
  }>;
}

export type CourseIndexJson = Record<string, CourseIndexJsonEntry>;

/**
 * Global course index keyed by course code. The first instance seen fixes
 * the canonical title and credit units; later sightings only add instances.
 */
export class CourseIndexBuilder {
  private index = new Map<string, CourseIndexEntry>();

  upsert(code: string, title: string, creditUnits: number, instance: CourseInstance): void {
    let entry = this.index.get(code);
    if (!entry) {
      entry = { canonicalTitle: title, canonicalCreditUnits: creditUnits, instances: [] };
      this.index.set(code, entry);
    }
    entry.instances.push(instance);
  }

  get(code: string): CourseIndexEntry | undefined {
    return this.index.get(code);
  }

  get size(): number {
    return this.index.size;
  }

  entries(): IterableIterator<[string, CourseIndexEntry]> {
    return this.index.entries();
  }

  /**
   * Sorted, deduplicated college names a course has appeared under
   */
  collegesOf(code: string): string[] {
    const entry = this.index.get(code);
    if (!entry) return [];
    return Array.from(new Set(entry.instances.map(i => i.college).filter(c => c.length > 0))).sort();
  }

  toJSON(): CourseIndexJson {
    const json: CourseIndexJson = {};
    for (const [code, entry] of this.index) {
      json[code] = {
        canonical_title: entry.canonicalTitle,
        canonical_cus: entry.canonicalCreditUnits,
        instances: entry.instances.map(i => ({
          catalog_date: i.catalogDate,
          college: i.college,
          degree: i.degree,
          pattern: i.pattern,
          raw: i.raw
        }))
      };
    }
    return json;
  }
}

export interface SectionScanResult {
  rows: string[];
  anomalies: Anomaly[];
  indexed: number;
}

/**
 * Walks sections, classifies every course row and feeds the course index.
 * Rows without a course code are kept as anomalies.
 */
export class CourseIndexAggregator {
  private logger: Logger;
  private builder: CourseIndexBuilder;

  constructor(builder: CourseIndexBuilder, logger?: Logger) {
    this.builder = builder;
    this.logger = logger ?? new Logger('CourseIndexAggregator');
  }

  /**
   * Sections must be passed in scan order (sorted file name, then section
   * insertion order); that order decides canonical titles.
   */
  aggregate(document: CatalogDocument, sections: Iterable<SectionRef>): SectionScanResult {
    const result: SectionScanResult = { rows: [], anomalies: [], indexed: 0 };

    for (const ref of sections) {
      const scan = this.scanSection(document, ref);
      result.rows.push(...scan.rows);
      result.anomalies.push(...scan.anomalies);
      result.indexed += scan.indexed;
    }

    this.logger.info(
      `${document.catalogDate}: ${result.indexed} course rows indexed, ${result.anomalies.length} anomalies`
    );
    return result;
  }

  scanSection(document: CatalogDocument, ref: SectionRef): SectionScanResult {
    const result: SectionScanResult = { rows: [], anomalies: [], indexed: 0 };
    const { startLine, stopLine } = ref.section;
    let inBlock = true;

    for (let i = startLine + 1; i < stopLine; i++) {
      const line = document.lines[i];
      if (isCcnHeader(line)) {
        inBlock = true;
        continue;
      }
      if (isFooter(line)) {
        inBlock = false;
        continue;
      }
      if (!inBlock || !line) continue;

      result.rows.push(line);
      const classified = classifyCourseRow(line);
      const code = classified ? courseCodeOf(classified) : null;

      if (!classified || code === null) {
        result.anomalies.push({
          catalogDate: ref.catalogDate,
          college: ref.college,
          degree: ref.degree,
          kind: classified ? 'NO_CODE' : 'UNMATCHED',
          raw: line
        });
        continue;
      }

      this.builder.upsert(code, classified.fields.title, classified.fields.creditUnits, {
        catalogDate: ref.catalogDate,
        college: ref.college,
        degree: ref.degree,
        pattern: classified.patternId,
        raw: line
      });
      result.indexed++;
    }

    return result;
  }
}
