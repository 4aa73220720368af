// src/types/patterns.types.ts
export type PatternId = 'CCN_FULL' | 'CODE_ONLY' | 'FALLBACK';

export type AnchorId =
  | 'CCN_HEADER'
  | 'COURSES_SECTION_BREAK'
  | 'PROGRAM_OUTCOMES'
  | 'SCHOOL_OF'
  | 'COLLEGE_OF'
  | 'FOOTER_COPYRIGHT'
  | 'FOOTER_TOTAL_CUS';

export interface CcnFullFields {
  department: string;
  number: string;
  code: string;
  title: string;
  creditUnits: number;
  term: number;
}

export interface CodeOnlyFields {
  code: string;
  title: string;
  creditUnits: number;
  term: number;
}

export interface FallbackFields {
  title: string;
  creditUnits: number;
  term: number;
}

export type ClassifiedCourseRow =
  | { patternId: 'CCN_FULL'; raw: string; fields: CcnFullFields }
  | { patternId: 'CODE_ONLY'; raw: string; fields: CodeOnlyFields }
  | { patternId: 'FALLBACK'; raw: string; fields: FallbackFields };

export type ClassifiedRowOf<P extends PatternId> = Extract<ClassifiedCourseRow, { patternId: P }>;

export interface CoursePattern<P extends PatternId = PatternId> {
  pattern: RegExp;
  toRow: (match: RegExpMatchArray, raw: string) => ClassifiedRowOf<P>;
}

export type CoursePatternTable = { [P in PatternId]: CoursePattern<P> };
