// src/services/CatalogPipeline.ts
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { listCatalogFiles, loadCatalogDocument } from '../parsers/CatalogDocumentLoader';
import { ProgramNameExtractor } from '../parsers/ProgramNameExtractor';
import { SectionIndexer, SectionsIndexBuilder } from '../parsers/SectionIndexer';
import {
  Anomaly,
  CatalogDate,
  CatalogDocument,
  DegreeSnapshot,
  IndexingStrategy,
  ProgramNameListing,
  ProgramNames,
  SectionFailure,
  SectionRef
} from '../types/catalog.types';
import { CatalogConfig } from '../types/config.types';
import { CatalogError, InvalidCatalogFileNameError, InvalidConfigError } from '../utils/errors';
import { FileHelpers } from '../utils/file-helpers';
import { Logger } from '../utils/logger';
import { CourseIndexAggregator, CourseIndexBuilder } from './CourseIndexAggregator';
import { DegreeSnapshotBuilder } from './DegreeSnapshotBuilder';
import { OutputWriter, programNamesPath } from './OutputWriter';
import { pickSnapshotVersion } from './SnapshotResolver';

const CachedProgramNamesSchema = z.record(z.array(z.string()));

export interface CatalogDateStats {
  catalogDate: CatalogDate;
  fileName: string;
  strategy: IndexingStrategy | null;
  programNames: number;
  sections: number;
  failures: SectionFailure[];
  courseRows: number;
  indexed: number;
  anomalies: number;
}

export interface PipelineResult {
  dates: CatalogDateStats[];
  skippedFiles: string[];
  courseCount: number;
  degreeSnapshotDates: CatalogDate[];
  outputs: string[];
}

interface CatalogDateOutput {
  listing: ProgramNameListing;
  rows: string[];
  anomalies: Anomaly[];
}

/**
 * Runs every catalog in the text directory through extraction, section
 * indexing and course aggregation, then writes all artifacts at once.
 * A fatal error aborts before anything is written.
 */
export class CatalogPipeline {
  private logger: Logger;
  private config: CatalogConfig;
  private extractor: ProgramNameExtractor;
  private snapshotBuilder: DegreeSnapshotBuilder;

  constructor(config: CatalogConfig, logger?: Logger) {
    this.config = config;
    this.logger = logger ?? new Logger('CatalogPipeline');
    this.extractor = new ProgramNameExtractor();
    this.snapshotBuilder = new DegreeSnapshotBuilder(config.degreeDuplicates);
  }

  run(): PipelineResult {
    const { textDir, outputDir } = this.config.paths;
    if (!fs.existsSync(textDir)) {
      throw new Error(`Catalog text directory not found: ${textDir}`);
    }

    const sectionsIndex = new SectionsIndexBuilder();
    const courseIndex = new CourseIndexBuilder();
    const indexer = new SectionIndexer(sectionsIndex, this.config.options.stopFence);
    const aggregator = new CourseIndexAggregator(courseIndex);

    const result: PipelineResult = {
      dates: [],
      skippedFiles: [],
      courseCount: 0,
      degreeSnapshotDates: [],
      outputs: []
    };
    const perDate = new Map<CatalogDate, CatalogDateOutput>();
    const degreeSnapshots = new Map<CatalogDate, DegreeSnapshot>();

    const files = listCatalogFiles(textDir);
    this.logger.info(`Found ${files.length} catalog files in ${textDir}`);

    for (const fileName of files) {
      let document: CatalogDocument;
      try {
        document = loadCatalogDocument(path.join(textDir, fileName));
      } catch (error) {
        if (!(error instanceof InvalidCatalogFileNameError)) throw error;
        this.logger.warn(error.message);
        result.skippedFiles.push(fileName);
        continue;
      }

      const { catalogDate } = document;
      this.logger.info(`Processing ${fileName} (${catalogDate}, ${document.lines.length} lines)`);

      const snapshotVersion = pickSnapshotVersion(catalogDate, this.config.collegeSnapshots);
      const validColleges = this.config.collegeSnapshots[snapshotVersion];
      const listing = this.readListing(document, validColleges);
      const stats: CatalogDateStats = {
        catalogDate,
        fileName,
        strategy: null,
        programNames: countNames(listing.programNames),
        sections: 0,
        failures: [],
        courseRows: 0,
        indexed: 0,
        anomalies: 0
      };
      result.dates.push(stats);

      let sections: SectionRef[];
      if (listing.programNames.size > 0) {
        const indexed = indexer.indexByHeadings(document, listing);
        stats.strategy = 'heading';
        sections = indexed.sections;
        stats.failures.push(...indexed.failures);
      } else {
        try {
          sections = [indexer.indexByUpwardScan(document, validColleges)];
          stats.strategy = 'upward-scan';
        } catch (error) {
          if (!(error instanceof CatalogError) || error.fatal) throw error;
          this.logger.warn(`Skipping ${fileName}: ${error.message}`);
          stats.failures.push({ catalogDate, reason: error.message });
          perDate.set(catalogDate, { listing, rows: [], anomalies: [] });
          continue;
        }
      }
      stats.sections = sections.length;

      const scan = aggregator.aggregate(document, sections);
      stats.courseRows = scan.rows.length;
      stats.indexed = scan.indexed;
      stats.anomalies = scan.anomalies.length;
      perDate.set(catalogDate, { listing, rows: scan.rows, anomalies: scan.anomalies });

      if (listing.programNames.size > 0) {
        const canonicalColleges = this.canonicalCollegesFor(snapshotVersion);
        degreeSnapshots.set(catalogDate, this.snapshotBuilder.build(catalogDate, listing.programNames, canonicalColleges));
      } else {
        this.logger.warn(`${catalogDate}: no program-name listing, degree snapshot skipped`);
      }
    }

    const writer = new OutputWriter(outputDir);
    for (const [catalogDate, output] of perDate) {
      writer.writeProgramNames(catalogDate, output.listing.programNames);
      writer.writeRawRows(catalogDate, output.rows);
      writer.writeAnomalies(catalogDate, output.anomalies.map(anomaly => anomaly.raw));
    }
    writer.writeSectionsIndex(sectionsIndex);
    writer.writeDegreeSnapshots(degreeSnapshots);
    writer.writeCourseIndex(courseIndex);
    writer.writeCourseCsvs(courseIndex);

    result.courseCount = courseIndex.size;
    result.degreeSnapshotDates = Array.from(degreeSnapshots.keys());
    result.outputs = writer.written;
    this.logger.info(
      `Indexed ${result.courseCount} courses from ${result.dates.length} catalogs; ` +
      `${result.outputs.length} files written to ${outputDir}`
    );
    return result;
  }

  /**
   * Canonical ordering for the snapshot version the valid colleges came from
   */
  private canonicalCollegesFor(snapshotVersion: string): readonly string[] {
    const { canonicalCollegeOrder } = this.config;
    if (!Object.prototype.hasOwnProperty.call(canonicalCollegeOrder, snapshotVersion)) {
      throw new InvalidConfigError(`Canonical college ordering has no version ${snapshotVersion}`);
    }
    return canonicalCollegeOrder[snapshotVersion];
  }

  private readListing(document: CatalogDocument, validColleges: readonly string[]): ProgramNameListing {
    if (this.config.options.reuseProgramNames) {
      const cachePath = programNamesPath(this.config.paths.outputDir, document.catalogDate);
      if (fs.existsSync(cachePath)) {
        const cached = CachedProgramNamesSchema.safeParse(FileHelpers.readJsonFile(cachePath));
        if (cached.success) {
          this.logger.info(`Reusing program names from ${cachePath}`);
          return this.extractor.restore(document, new Map(Object.entries(cached.data)));
        }
        this.logger.warn(`Ignoring unreadable program names cache ${cachePath}`);
      }
    }
    return this.extractor.extract(document, validColleges);
  }
}

function countNames(programNames: ProgramNames): number {
  let total = 0;
  for (const names of programNames.values()) {
    total += names.length;
  }
  return total;
}
