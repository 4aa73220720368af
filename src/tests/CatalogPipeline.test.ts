// src/tests/CatalogPipeline.test.ts
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig } from '../config/loadConfig';
import { CatalogPipeline } from '../services/CatalogPipeline';
import { CatalogOptions } from '../types/config.types';
import { InvalidConfigError, MissingCollegeError, NoApplicableSnapshotError } from '../utils/errors';

const CATALOG_2018_07 = [
  'College of Business',
  'Bachelor of Science, Business',
  'CCN Course Number Title CUS Term',
  'BUS 1010 C100 Intro to Business 3 1',
  'Total CUs 120'
].join('\n') + '\n';

// No front-matter listing: the college line only starts with a known name
const CATALOG_2019_01 = [
  'Sample University Catalog',
  'College of Business Programs',
  'Bachelor of Science, Accounting',
  'CCN Course Number Course Title CUs Term',
  'C100 Introduction to Business 3 1',
  'Special Topics Seminar abc 3',
  'Total CUs 121'
].join('\n') + '\n';

describe('CatalogPipeline', () => {
  let tempDir: string;
  let textDir: string;
  let outputDir: string;

  const writeJson = (name: string, data: unknown): string => {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, JSON.stringify(data));
    return filePath;
  };

  const readOutput = (relativePath: string): unknown =>
    JSON.parse(fs.readFileSync(path.join(outputDir, relativePath), 'utf-8'));

  const createPipeline = (colleges: string[], options: Partial<CatalogOptions> = {}): CatalogPipeline => {
    const config = loadConfig({
      textDir,
      outputDir,
      snapshotsFile: writeJson('college_snapshots.json', { '2017-01': colleges }),
      duplicatesFile: writeJson('degree_duplicates_master.json', {})
    }, options);
    return new CatalogPipeline(config);
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-pipeline-'));
    textDir = path.join(tempDir, 'texts');
    outputDir = path.join(tempDir, 'outputs');
    fs.mkdirSync(textDir);
    fs.writeFileSync(path.join(textDir, 'catalog_2018_07.txt'), CATALOG_2018_07);
    fs.writeFileSync(path.join(textDir, 'catalog_2019_01.txt'), CATALOG_2019_01);
    fs.writeFileSync(path.join(textDir, 'notes.txt'), 'not a catalog');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('run', () => {
    it('should index headings where a listing exists and scan upward where it does not', () => {
      const result = createPipeline(['College of Business']).run();

      expect(result.skippedFiles).toEqual(['notes.txt']);
      expect(result.dates.map(stats => [stats.catalogDate, stats.strategy, stats.sections, stats.indexed, stats.anomalies]))
        .toEqual([
          ['2018-07', 'heading', 1, 1, 0],
          ['2019-01', 'upward-scan', 1, 1, 1]
        ]);
      expect(result.courseCount).toBe(1);
      expect(result.degreeSnapshotDates).toEqual(['2018-07']);
      expect(result.outputs).toHaveLength(11);
    });

    it('should write the sections index', () => {
      createPipeline(['College of Business']).run();

      expect(readOutput('helpers/sections_index_v10.json')).toEqual({
        '2018-07': { 'College of Business': { 'Bachelor of Science, Business': [2, 4] } },
        '2019-01': { 'College of Business': { 'Bachelor of Science, Accounting': [3, 6] } }
      });
    });

    it('should take the canonical title from the earliest catalog', () => {
      createPipeline(['College of Business']).run();

      const courseIndex = readOutput('helpers/course_index_v10.json');
      expect(courseIndex).toEqual({
        C100: {
          canonical_title: 'Intro to Business',
          canonical_cus: 3,
          instances: [
            {
              catalog_date: '2018-07',
              college: 'College of Business',
              degree: 'Bachelor of Science, Business',
              pattern: 'CCN_FULL',
              raw: 'BUS 1010 C100 Intro to Business 3 1'
            },
            {
              catalog_date: '2019-01',
              college: 'College of Business',
              degree: 'Bachelor of Science, Accounting',
              pattern: 'CODE_ONLY',
              raw: 'C100 Introduction to Business 3 1'
            }
          ]
        }
      });
    });

    it('should write per-date anomalies, raw rows and program names', () => {
      createPipeline(['College of Business']).run();

      expect(readOutput('anomalies/anomalies_2018_07_v10.json')).toEqual([]);
      expect(readOutput('anomalies/anomalies_2019_01_v10.json')).toEqual(['Special Topics Seminar abc 3']);
      expect(readOutput('raw_course_rows/2019_01_raw_course_rows_v10.json')).toEqual([
        'C100 Introduction to Business 3 1',
        'Special Topics Seminar abc 3'
      ]);
      expect(readOutput('program_names/2018_07_program_names_v10.json')).toEqual({
        'College of Business': ['Bachelor of Science, Business']
      });
      expect(readOutput('program_names/2019_01_program_names_v10.json')).toEqual({});
    });

    it('should write degree snapshots and course CSVs', () => {
      createPipeline(['College of Business']).run();

      expect(readOutput('helpers/degree_snapshots_v10_seed.json')).toEqual({
        '2018-07': { 'College of Business': ['Bachelor of Science, Business'] }
      });
      expect(fs.readFileSync(path.join(outputDir, 'courses_flat.csv'), 'utf-8'))
        .toBe('CourseCode,CourseName\nC100,Intro to Business\n');
      expect(fs.readFileSync(path.join(outputDir, 'courses_with_college.csv'), 'utf-8'))
        .toBe('CourseCode,CourseName,Colleges\nC100,Intro to Business,College of Business\n');
    });

    it('should reuse saved program names when asked', () => {
      fs.mkdirSync(path.join(outputDir, 'program_names'), { recursive: true });
      fs.writeFileSync(
        path.join(outputDir, 'program_names', '2019_01_program_names_v10.json'),
        JSON.stringify({ 'College of Business': ['Bachelor of Science, Accounting'] })
      );

      const result = createPipeline(['College of Business'], { reuseProgramNames: true }).run();

      expect(result.dates[1].strategy).toBe('heading');
      expect(result.degreeSnapshotDates).toEqual(['2018-07', '2019-01']);
      expect(readOutput('helpers/degree_snapshots_v10_seed.json')).toEqual({
        '2018-07': { 'College of Business': ['Bachelor of Science, Business'] },
        '2019-01': { 'College of Business': ['Bachelor of Science, Accounting'] }
      });
    });

    it('should order colleges by the snapshot version the valid colleges came from', () => {
      const config = loadConfig({
        textDir,
        outputDir,
        snapshotsFile: writeJson('college_snapshots.json', { '2017-01': ['College of Business'] }),
        canonicalOrderFile: writeJson('college_order.json', {
          '2017-01': ['College of Business'],
          '2018-01': ['College of Business', 'Teachers College']
        }),
        duplicatesFile: writeJson('degree_duplicates_master.json', {})
      });

      const result = new CatalogPipeline(config).run();

      expect(result.degreeSnapshotDates).toEqual(['2018-07']);
      expect(readOutput('helpers/degree_snapshots_v10_seed.json')).toEqual({
        '2018-07': { 'College of Business': ['Bachelor of Science, Business'] }
      });
    });

    it('should abort without writing when the ordering lacks the resolved version', () => {
      const config = loadConfig({
        textDir,
        outputDir,
        snapshotsFile: writeJson('college_snapshots.json', { '2017-01': ['College of Business'] }),
        canonicalOrderFile: writeJson('college_order.json', { '2018-01': ['College of Business'] }),
        duplicatesFile: writeJson('degree_duplicates_master.json', {})
      });

      expect(() => new CatalogPipeline(config).run())
        .toThrow(new InvalidConfigError('Canonical college ordering has no version 2017-01'));
      expect(fs.existsSync(outputDir)).toBe(false);
    });

    it('should abort without writing when no snapshot applies', () => {
      const config = loadConfig({
        textDir,
        outputDir,
        snapshotsFile: writeJson('college_snapshots.json', { '2019-01': ['College of Business'] }),
        duplicatesFile: writeJson('degree_duplicates_master.json', {})
      });

      expect(() => new CatalogPipeline(config).run()).toThrow(NoApplicableSnapshotError);
      expect(fs.existsSync(outputDir)).toBe(false);
    });

    it('should abort without writing when a canonical college is missing', () => {
      const pipeline = createPipeline(['College of Business', 'Teachers College']);

      expect(() => pipeline.run()).toThrow(MissingCollegeError);
      expect(fs.existsSync(outputDir)).toBe(false);
    });
  });
});
