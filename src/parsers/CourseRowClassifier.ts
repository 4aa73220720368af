// src/parsers/CourseRowClassifier.ts
import { COURSE_PATTERNS, COURSE_PATTERN_ORDER } from '../config/patterns';
import { ClassifiedCourseRow } from '../types/patterns.types';

/**
 * Classify one course line. Patterns are tried in order (CCN_FULL,
 * CODE_ONLY, FALLBACK) and the first match wins; null means the row is an
 * anomaly. Never throws.
 */
export function classifyCourseRow(row: string): ClassifiedCourseRow | null {
  for (const id of COURSE_PATTERN_ORDER) {
    const { pattern, toRow } = COURSE_PATTERNS[id];
    const match = row.match(pattern);
    if (match) {
      return toRow(match, row);
    }
  }
  return null;
}

/**
 * Course code carried by the row, when its pattern has one
 */
export function courseCodeOf(row: ClassifiedCourseRow): string | null {
  switch (row.patternId) {
    case 'CCN_FULL':
    case 'CODE_ONLY':
      return row.fields.code;
    case 'FALLBACK':
      return null;
    default:
      return assertNever(row);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled course pattern: ${JSON.stringify(value)}`);
}
