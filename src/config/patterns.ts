// src/config/patterns.ts
import { AnchorId, CoursePatternTable, PatternId } from '../types/patterns.types';

// Structural anchors, matched against whole trimmed catalog lines
export const ANCHORS: Readonly<Record<AnchorId, RegExp>> = {
  // e.g. "CCN Course Number Course Title CUs Term"
  CCN_HEADER: /CCN.*Course Number/i,
  COURSES_SECTION_BREAK: /^Courses/i,
  PROGRAM_OUTCOMES: /^Program Outcomes$/i,
  SCHOOL_OF: /^School of /i,
  COLLEGE_OF: /College of /i,
  FOOTER_COPYRIGHT: /©/,
  FOOTER_TOTAL_CUS: /Total CUs/i
};

// Front-matter lines that are never degree names: "Steps ...", numbered items, bullets, dashes
export const PROGRAM_TITLE_EXCLUDE_PATTERN = /^(Steps|[0-9]|[•\-])/;

// Lines that end a front-matter program listing
export const PROGRAM_LISTING_TERMINATORS: readonly RegExp[] = [
  ANCHORS.COURSES_SECTION_BREAK,
  ANCHORS.PROGRAM_OUTCOMES,
  ANCHORS.FOOTER_COPYRIGHT,
  ANCHORS.FOOTER_TOTAL_CUS,
  ANCHORS.SCHOOL_OF
];

export function isCcnHeader(line: string): boolean {
  return ANCHORS.CCN_HEADER.test(line);
}

export function isFooter(line: string): boolean {
  return ANCHORS.FOOTER_COPYRIGHT.test(line) || ANCHORS.FOOTER_TOTAL_CUS.test(line);
}

export function isCollegeHeading(line: string): boolean {
  return ANCHORS.COLLEGE_OF.test(line) || ANCHORS.SCHOOL_OF.test(line);
}

// Course row patterns. Tried in COURSE_PATTERN_ORDER, first match wins.
export const COURSE_PATTERNS: CoursePatternTable = {
  CCN_FULL: {
    // e.g. "BUS 1010 C100 Intro to Business 3 1"
    pattern: /^([A-Z]{2,5})\s+(\d{1,4})\s+([A-Z0-9]{2,5})\s+(.+?)\s+(\d+)\s+(\d+)$/,
    toRow: (match, raw) => ({
      patternId: 'CCN_FULL',
      raw,
      fields: {
        department: match[1],
        number: match[2],
        code: match[3],
        title: match[4],
        creditUnits: parseInt(match[5], 10),
        term: parseInt(match[6], 10)
      }
    })
  },
  CODE_ONLY: {
    // e.g. "C200 Data Management 4 2"
    pattern: /^([A-Z0-9]{1,6})\s+(.+?)\s+(\d+)\s+(\d+)$/,
    toRow: (match, raw) => ({
      patternId: 'CODE_ONLY',
      raw,
      fields: {
        code: match[1],
        title: match[2],
        creditUnits: parseInt(match[3], 10),
        term: parseInt(match[4], 10)
      }
    })
  },
  FALLBACK: {
    // e.g. "Capstone Project 4 8"
    pattern: /^(.+?)\s+(\d+)\s+(\d+)$/,
    toRow: (match, raw) => ({
      patternId: 'FALLBACK',
      raw,
      fields: {
        title: match[1],
        creditUnits: parseInt(match[2], 10),
        term: parseInt(match[3], 10)
      }
    })
  }
};

export const COURSE_PATTERN_ORDER: readonly PatternId[] = ['CCN_FULL', 'CODE_ONLY', 'FALLBACK'];
