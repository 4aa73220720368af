// src/tests/CatalogDocumentLoader.test.ts
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  catalogDatePrefix,
  createCatalogDocument,
  listCatalogFiles,
  loadCatalogDocument,
  parseCatalogFileName
} from '../parsers/CatalogDocumentLoader';
import { InvalidCatalogFileNameError } from '../utils/errors';

describe('CatalogDocumentLoader', () => {
  describe('parseCatalogFileName', () => {
    it('should derive the catalog date from the file name', () => {
      expect(parseCatalogFileName('catalog_2018_07.txt')).toBe('2018-07');
      expect(parseCatalogFileName('/data/texts/catalog_2024_12.txt')).toBe('2024-12');
    });

    it('should reject names outside the catalog convention', () => {
      expect(() => parseCatalogFileName('notes.txt')).toThrow(InvalidCatalogFileNameError);
      expect(() => parseCatalogFileName('catalog_2018_7.txt')).toThrow(InvalidCatalogFileNameError);
    });

    it('should reject an impossible month', () => {
      expect(() => parseCatalogFileName('catalog_2018_13.txt')).toThrow(InvalidCatalogFileNameError);
    });
  });

  it('should turn a catalog date into a file prefix', () => {
    expect(catalogDatePrefix('2018-07')).toBe('2018_07');
  });

  describe('createCatalogDocument', () => {
    it('should trim lines and keep blank lines in place', () => {
      const document = createCatalogDocument('catalog_2018_07.txt', '  College of Business \r\nBachelor\n\nX\n');

      expect(document.catalogDate).toBe('2018-07');
      expect(document.fileName).toBe('catalog_2018_07.txt');
      expect(document.lines).toEqual(['College of Business', 'Bachelor', '', 'X']);
    });

    it('should keep the last line when there is no trailing newline', () => {
      const document = createCatalogDocument('catalog_2018_07.txt', 'A\nB');

      expect(document.lines).toEqual(['A', 'B']);
    });
  });

  describe('file access', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-loader-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should list text files in sorted order', () => {
      fs.writeFileSync(path.join(tempDir, 'catalog_2019_01.txt'), '');
      fs.writeFileSync(path.join(tempDir, 'catalog_2018_07.txt'), '');
      fs.writeFileSync(path.join(tempDir, 'readme.md'), '');

      expect(listCatalogFiles(tempDir)).toEqual(['catalog_2018_07.txt', 'catalog_2019_01.txt']);
    });

    it('should load a document from disk', () => {
      const filePath = path.join(tempDir, 'catalog_2020_03.txt');
      fs.writeFileSync(filePath, 'School of Business\nMBA\n');

      const document = loadCatalogDocument(filePath);

      expect(document.catalogDate).toBe('2020-03');
      expect(document.lines).toEqual(['School of Business', 'MBA']);
    });
  });
});
