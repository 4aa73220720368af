// src/services/OutputWriter.ts
import * as path from 'path';
import { catalogDatePrefix } from '../parsers/CatalogDocumentLoader';
import { SectionsIndexBuilder } from '../parsers/SectionIndexer';
import { CatalogDate, DegreeSnapshot, ProgramNames } from '../types/catalog.types';
import { FileHelpers } from '../utils/file-helpers';
import { Logger } from '../utils/logger';
import { CourseIndexBuilder } from './CourseIndexAggregator';
import { DegreeSnapshotBuilder } from './DegreeSnapshotBuilder';

export const OUTPUT_FILES = {
  sectionsIndex: path.join('helpers', 'sections_index_v10.json'),
  degreeSnapshots: path.join('helpers', 'degree_snapshots_v10_seed.json'),
  courseIndex: path.join('helpers', 'course_index_v10.json'),
  coursesFlat: 'courses_flat.csv',
  coursesWithCollege: 'courses_with_college.csv'
} as const;

export function programNamesPath(outputDir: string, catalogDate: CatalogDate): string {
  return path.join(outputDir, 'program_names', `${catalogDatePrefix(catalogDate)}_program_names_v10.json`);
}

export function anomaliesPath(outputDir: string, catalogDate: CatalogDate): string {
  return path.join(outputDir, 'anomalies', `anomalies_${catalogDatePrefix(catalogDate)}_v10.json`);
}

export function rawRowsPath(outputDir: string, catalogDate: CatalogDate): string {
  return path.join(outputDir, 'raw_course_rows', `${catalogDatePrefix(catalogDate)}_raw_course_rows_v10.json`);
}

/**
 * Writes every artifact of a run under one output directory, overwriting
 * previous runs. Keeps the list of files written.
 */
export class OutputWriter {
  private logger: Logger;
  private outputDir: string;
  readonly written: string[] = [];

  constructor(outputDir: string, logger?: Logger) {
    this.outputDir = outputDir;
    this.logger = logger ?? new Logger('OutputWriter');
  }

  writeProgramNames(catalogDate: CatalogDate, programNames: ProgramNames): string {
    return this.writeJson(programNamesPath(this.outputDir, catalogDate), Object.fromEntries(programNames));
  }

  writeAnomalies(catalogDate: CatalogDate, rawLines: string[]): string {
    return this.writeJson(anomaliesPath(this.outputDir, catalogDate), rawLines);
  }

  writeRawRows(catalogDate: CatalogDate, rows: string[]): string {
    return this.writeJson(rawRowsPath(this.outputDir, catalogDate), rows);
  }

  writeSectionsIndex(sections: SectionsIndexBuilder): string {
    return this.writeJson(path.join(this.outputDir, OUTPUT_FILES.sectionsIndex), sections.toJSON());
  }

  writeDegreeSnapshots(snapshots: ReadonlyMap<CatalogDate, DegreeSnapshot>): string {
    return this.writeJson(
      path.join(this.outputDir, OUTPUT_FILES.degreeSnapshots),
      DegreeSnapshotBuilder.toJSON(snapshots)
    );
  }

  writeCourseIndex(courses: CourseIndexBuilder): string {
    return this.writeJson(path.join(this.outputDir, OUTPUT_FILES.courseIndex), courses.toJSON());
  }

  writeCourseCsvs(courses: CourseIndexBuilder): string[] {
    const flatRows: string[][] = [];
    const collegeRows: string[][] = [];
    for (const [code, entry] of courses.entries()) {
      const title = entry.canonicalTitle.trim();
      flatRows.push([code.trim(), title]);
      collegeRows.push([code.trim(), title, courses.collegesOf(code).join('; ')]);
    }

    return [
      this.writeText(
        path.join(this.outputDir, OUTPUT_FILES.coursesFlat),
        FileHelpers.toCsv(['CourseCode', 'CourseName'], flatRows)
      ),
      this.writeText(
        path.join(this.outputDir, OUTPUT_FILES.coursesWithCollege),
        FileHelpers.toCsv(['CourseCode', 'CourseName', 'Colleges'], collegeRows)
      )
    ];
  }

  private writeJson(filePath: string, data: unknown): string {
    FileHelpers.writeJsonFile(filePath, data);
    return this.record(filePath);
  }

  private writeText(filePath: string, content: string): string {
    FileHelpers.writeTextFile(filePath, content);
    return this.record(filePath);
  }

  private record(filePath: string): string {
    this.written.push(filePath);
    this.logger.debug(`Saved: ${filePath}`);
    return filePath;
  }
}
