// src/tests/SnapshotResolver.test.ts
import { pickSnapshot, pickSnapshotVersion } from '../services/SnapshotResolver';
import { NoApplicableSnapshotError } from '../utils/errors';

describe('SnapshotResolver', () => {
  const snapshots = {
    '2019-01': ['College of Business', 'Teachers College'],
    '2017-01': ['College of Business'],
    '2024-04': ['School of Business', 'School of Education']
  };

  describe('pickSnapshotVersion', () => {
    it('should pick the latest version not after the catalog date', () => {
      expect(pickSnapshotVersion('2018-07', snapshots)).toBe('2017-01');
      expect(pickSnapshotVersion('2023-12', snapshots)).toBe('2019-01');
      expect(pickSnapshotVersion('2025-06', snapshots)).toBe('2024-04');
    });

    it('should pick a version equal to the catalog date', () => {
      expect(pickSnapshotVersion('2019-01', snapshots)).toBe('2019-01');
    });

    it('should throw when every version is later than the catalog date', () => {
      expect(() => pickSnapshotVersion('2016-12', snapshots)).toThrow(NoApplicableSnapshotError);
    });

    it('should throw on an empty dictionary', () => {
      expect(() => pickSnapshotVersion('2020-01', {})).toThrow('No snapshot version found for 2020-01');
    });
  });

  describe('pickSnapshot', () => {
    it('should return the college list of the chosen version', () => {
      expect(pickSnapshot('2020-03', snapshots)).toEqual(['College of Business', 'Teachers College']);
    });

    it('should return the same list object for dates with no version between them', () => {
      expect(pickSnapshot('2017-03', snapshots)).toBe(pickSnapshot('2018-11', snapshots));
      expect(pickSnapshot('2017-03', snapshots)).not.toBe(pickSnapshot('2019-02', snapshots));
    });
  });
});
