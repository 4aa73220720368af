// src/services/CourseListMerger.ts
import * as fs from 'fs';
import csv from 'csv-parser';
import { z } from 'zod';
import { FileHelpers } from '../utils/file-helpers';
import { Logger } from '../utils/logger';

const logger = new Logger('CourseListMerger');

const CsvRowSchema = z.record(z.string());
const CollegeRemapSchema = z.record(z.string());

export const NOT_FOUND = 'NOT FOUND';

export interface MergeCourseListOptions {
  coursesWithCollegeCsv: string;
  courseListCsv: string;
  outputCsv: string;
  collegeRemap?: Readonly<Record<string, string>>;
}

export interface MergeCourseListResult {
  total: number;
  found: number;
  missing: string[];
}

interface CsvTable {
  headers: string[];
  rows: Array<Record<string, string>>;
}

export function readCsv(filePath: string): Promise<CsvTable> {
  return new Promise<CsvTable>((resolve, reject) => {
    const table: CsvTable = { headers: [], rows: [] };
    fs.createReadStream(filePath)
      .on('error', reject)
      .pipe(csv())
      .on('headers', (headers: string[]) => {
        table.headers = headers;
      })
      .on('data', (row: unknown) => {
        table.rows.push(CsvRowSchema.parse(row));
      })
      .on('error', reject)
      .on('end', () => resolve(table));
  });
}

export function loadCollegeRemap(filePath: string): Record<string, string> {
  return CollegeRemapSchema.parse(FileHelpers.readJsonFile(filePath));
}

/**
 * Course code -> "; "-joined, remapped, sorted unique colleges
 */
export function buildCourseCollegeMap(
  rows: Array<Record<string, string>>,
  collegeRemap: Readonly<Record<string, string>> = {}
): Map<string, string> {
  const map = new Map<string, string>();
  for (const row of rows) {
    const code = (row.CourseCode ?? '').trim();
    if (!code) continue;
    const colleges = (row.Colleges ?? '')
      .split(';')
      .map(college => college.trim())
      .filter(college => college.length > 0)
      .map(college => collegeRemap[college] ?? college);
    map.set(code, Array.from(new Set(colleges)).sort().join('; '));
  }
  return map;
}

/**
 * Append a Colleges column to a course list using the colleges each course
 * appeared under in courses_with_college.csv.
 */
export async function mergeCourseListColleges(options: MergeCourseListOptions): Promise<MergeCourseListResult> {
  const withCollege = await readCsv(options.coursesWithCollegeCsv);
  const courseList = await readCsv(options.courseListCsv);
  const collegeMap = buildCourseCollegeMap(withCollege.rows, options.collegeRemap);

  const headers = courseList.headers.includes('Colleges')
    ? courseList.headers
    : [...courseList.headers, 'Colleges'];
  const result: MergeCourseListResult = { total: 0, found: 0, missing: [] };
  const output: string[][] = [];

  for (const row of courseList.rows) {
    result.total++;
    const code = (row.CourseCode ?? '').trim();
    const colleges = collegeMap.get(code);

    if (colleges) {
      result.found++;
    } else {
      logger.warn(`${code} not found in college list`);
      result.missing.push(code);
    }

    const merged: Record<string, string> = { ...row, Colleges: colleges || NOT_FOUND };
    output.push(headers.map(header => merged[header] ?? ''));
  }

  FileHelpers.writeTextFile(options.outputCsv, FileHelpers.toCsv(headers, output));
  logger.info(`Merged ${result.total} courses: ${result.found} found, ${result.missing.length} missing`);
  return result;
}
