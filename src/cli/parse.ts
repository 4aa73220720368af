#!/usr/bin/env node
// src/cli/parse.ts
import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { loadConfig, resolveCatalogSettings } from '../config/loadConfig';
import { StopFenceMode } from '../types/catalog.types';
import { CatalogPipeline, PipelineResult } from '../services/CatalogPipeline';
import { loadCollegeRemap, mergeCourseListColleges } from '../services/CourseListMerger';
import { isFatal } from '../utils/errors';
import { initializeLogger } from '../utils/log-config-loader';
import { Logger, getLogFilePaths } from '../utils/logger';

const logger = new Logger('CLI');

interface ParseCommandOptions {
  textDir?: string;
  outputDir?: string;
  snapshots?: string;
  canonicalOrder?: string;
  duplicates?: string;
  config?: string;
  stopFence?: string;
  reuseProgramNames?: boolean;
  logLevel?: string;
}

interface MergeCommandOptions {
  remap: string;
}

function parseStopFence(value: string): StopFenceMode {
  if (value !== 'strict' && value !== 'sibling-only') {
    throw new Error(`--stop-fence must be 'strict' or 'sibling-only', got '${value}'`);
  }
  return value;
}

function printSummary(result: PipelineResult): void {
  console.log(chalk.blue('═══════════════════════════════════════'));
  console.log(chalk.blue.bold('  Catalog Index Summary'));
  console.log(chalk.blue('═══════════════════════════════════════'));

  for (const stats of result.dates) {
    const line = `${stats.catalogDate}  ${stats.strategy ?? 'skipped'}  ` +
      `sections=${stats.sections} rows=${stats.courseRows} indexed=${stats.indexed} anomalies=${stats.anomalies}`;
    if (stats.strategy === null || stats.failures.length > 0) {
      console.log(chalk.yellow(`${line}  issues=${stats.failures.length}`));
    } else {
      console.log(chalk.green(line));
    }
  }

  for (const fileName of result.skippedFiles) {
    console.log(chalk.yellow(`Skipped ${fileName}`));
  }

  console.log(chalk.cyan(`Courses indexed: ${result.courseCount}`));
  console.log(chalk.cyan(`Degree snapshots: ${result.degreeSnapshotDates.length}`));
  console.log(chalk.cyan(`Files written: ${result.outputs.length}`));

  const logFiles = getLogFilePaths();
  if (logFiles) {
    console.log(chalk.gray(`Log: ${logFiles.combined}`));
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('catalog-indexer')
    .description('Index degree sections and courses from catalog text dumps')
    .version('1.0.0');

  program
    .command('parse')
    .description('Parse every catalog text file and write the course and section indexes')
    .option('-d, --text-dir <path>', 'Directory containing catalog_YYYY_MM.txt files')
    .option('-o, --output-dir <path>', 'Output directory for indexes and CSVs')
    .option('--snapshots <path>', 'College snapshots JSON file')
    .option('--canonical-order <path>', 'Canonical college ordering JSON file')
    .option('--duplicates <path>', 'Degree duplicates JSON file')
    .option('-c, --config <path>', 'Path to configuration file')
    .option('--stop-fence <mode>', 'Section stop fence: strict or sibling-only')
    .option('--reuse-program-names', 'Reuse program names saved by a previous run')
    .option('--log-level <level>', 'Log level (debug, info, warn, error)')
    .action((options: ParseCommandOptions) => {
      initializeLogger();
      if (options.logLevel) {
        logger.setLevel(options.logLevel);
      }

      try {
        const settings = resolveCatalogSettings({
          configFile: options.config,
          textDir: options.textDir,
          outputDir: options.outputDir,
          snapshotsFile: options.snapshots,
          canonicalOrderFile: options.canonicalOrder,
          duplicatesFile: options.duplicates,
          stopFence: options.stopFence ? parseStopFence(options.stopFence) : undefined,
          reuseProgramNames: options.reuseProgramNames
        });
        logger.info(`Catalog texts: ${settings.paths.textDir}`);
        logger.info(`Output: ${settings.paths.outputDir}`);

        const config = loadConfig(settings.paths, settings.options);
        const result = new CatalogPipeline(config).run();
        printSummary(result);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`${isFatal(error) ? 'Fatal' : 'Unexpected'} error: ${message}`);
        process.exit(1);
      }
    });

  program
    .command('merge-colleges <courseList> <withCollege> <output>')
    .description('Append a Colleges column to a course list CSV')
    .option('--remap <path>', 'College name remap JSON file', path.join('config', 'college-remap.json'))
    .action(async (courseList: string, withCollege: string, output: string, options: MergeCommandOptions) => {
      initializeLogger();

      try {
        const result = await mergeCourseListColleges({
          courseListCsv: path.resolve(courseList),
          coursesWithCollegeCsv: path.resolve(withCollege),
          outputCsv: path.resolve(output),
          collegeRemap: loadCollegeRemap(path.resolve(options.remap))
        });

        console.log(chalk.blue.bold('\n--- Summary ---'));
        console.log(`Total courses processed: ${result.total}`);
        console.log(chalk.green(`Found: ${result.found}`));
        console.log(chalk.yellow(`Missing: ${result.missing.length}`));
      } catch (error) {
        logger.error('Merge failed', error);
        process.exit(1);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error('Command failed', error);
      process.exit(1);
    });
}
