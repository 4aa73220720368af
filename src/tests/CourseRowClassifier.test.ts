// src/tests/CourseRowClassifier.test.ts
import { classifyCourseRow, courseCodeOf } from '../parsers/CourseRowClassifier';

describe('CourseRowClassifier', () => {
  describe('classifyCourseRow', () => {
    it('should classify a full CCN row', () => {
      const result = classifyCourseRow('BUS 1010 C100 Intro to Business 3 1');

      expect(result).toEqual({
        patternId: 'CCN_FULL',
        raw: 'BUS 1010 C100 Intro to Business 3 1',
        fields: {
          department: 'BUS',
          number: '1010',
          code: 'C100',
          title: 'Intro to Business',
          creditUnits: 3,
          term: 1
        }
      });
    });

    it('should classify a code-only row', () => {
      const result = classifyCourseRow('C200 Data Management 4 2');

      expect(result?.patternId).toBe('CODE_ONLY');
      expect(result?.fields).toEqual({ code: 'C200', title: 'Data Management', creditUnits: 4, term: 2 });
    });

    it('should prefer CCN_FULL when a row also matches CODE_ONLY', () => {
      const row = 'BUS 1010 C100 Intro to Business 3 1';

      // "BUS" is a valid code and the rest a valid title
      expect(/^([A-Z0-9]{1,6})\s+(.+?)\s+(\d+)\s+(\d+)$/.test(row)).toBe(true);
      expect(classifyCourseRow(row)?.patternId).toBe('CCN_FULL');
    });

    it('should fall back to title and numbers when no code is present', () => {
      const result = classifyCourseRow('capstone project 4 8');

      expect(result?.patternId).toBe('FALLBACK');
      expect(result?.fields).toEqual({ title: 'capstone project', creditUnits: 4, term: 8 });
    });

    it('should return null for a row with a non-numeric credit field', () => {
      expect(classifyCourseRow('Special Topics Seminar abc 3')).toBeNull();
    });

    it('should return null for an empty row', () => {
      expect(classifyCourseRow('')).toBeNull();
    });
  });

  describe('courseCodeOf', () => {
    it('should return the code of coded rows only', () => {
      const full = classifyCourseRow('BUS 1010 C100 Intro to Business 3 1');
      const codeOnly = classifyCourseRow('C200 Data Management 4 2');
      const fallback = classifyCourseRow('capstone project 4 8');

      expect(full && courseCodeOf(full)).toBe('C100');
      expect(codeOnly && courseCodeOf(codeOnly)).toBe('C200');
      expect(fallback && courseCodeOf(fallback)).toBeNull();
    });
  });
});
