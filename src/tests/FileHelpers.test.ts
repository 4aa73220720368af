// src/tests/FileHelpers.test.ts
import { FileHelpers } from '../utils/file-helpers';

describe('FileHelpers', () => {
  describe('toCsv', () => {
    it('should quote only fields that need it', () => {
      const csv = FileHelpers.toCsv(
        ['CourseCode', 'CourseName', 'Colleges'],
        [
          ['C100', 'Intro to Business', 'School of Business'],
          ['C200', 'Ethics, Law and "Policy"', 'School of Business; School of Technology']
        ]
      );

      expect(csv).toBe(
        'CourseCode,CourseName,Colleges\n' +
        'C100,Intro to Business,School of Business\n' +
        'C200,"Ethics, Law and ""Policy""",School of Business; School of Technology\n'
      );
    });
  });
});
