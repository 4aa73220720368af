// src/index.ts - Library entry point
export * from './types/catalog.types';
export * from './types/config.types';
export * from './types/patterns.types';
export { ANCHORS, COURSE_PATTERNS, COURSE_PATTERN_ORDER } from './config/patterns';
export {
  loadConfig,
  loadConfigFile,
  normalizeDuplicates,
  parseSnapshotDictionary,
  resolveCatalogSettings
} from './config/loadConfig';
export {
  createCatalogDocument,
  listCatalogFiles,
  loadCatalogDocument,
  parseCatalogFileName
} from './parsers/CatalogDocumentLoader';
export { ProgramNameExtractor } from './parsers/ProgramNameExtractor';
export { SectionIndexer, SectionsIndexBuilder } from './parsers/SectionIndexer';
export { classifyCourseRow, courseCodeOf } from './parsers/CourseRowClassifier';
export { pickSnapshot, pickSnapshotVersion } from './services/SnapshotResolver';
export { DegreeSnapshotBuilder, resolveDegreeName } from './services/DegreeSnapshotBuilder';
export { CourseIndexAggregator, CourseIndexBuilder } from './services/CourseIndexAggregator';
export { OutputWriter } from './services/OutputWriter';
export { CatalogPipeline } from './services/CatalogPipeline';
export type { CatalogDateStats, PipelineResult } from './services/CatalogPipeline';
export { mergeCourseListColleges } from './services/CourseListMerger';
export * from './utils/errors';
