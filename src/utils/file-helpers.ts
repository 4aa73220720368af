// src/utils/file-helpers.ts
import * as fs from 'fs-extra';
import * as path from 'path';

export class FileHelpers {
  /**
   * Read and parse a JSON file. The caller validates the shape.
   */
  static readJsonFile(filePath: string): unknown {
    return fs.readJsonSync(filePath, { encoding: 'utf-8' });
  }

  /**
   * Write pretty-printed JSON, creating the parent directory when needed
   */
  static writeJsonFile(filePath: string, data: unknown): void {
    fs.ensureDirSync(path.dirname(filePath));
    fs.writeJsonSync(filePath, data, { spaces: 2, encoding: 'utf-8' });
  }

  static writeTextFile(filePath: string, content: string): void {
    fs.ensureDirSync(path.dirname(filePath));
    fs.writeFileSync(filePath, content, 'utf-8');
  }

  /**
   * File names in a directory, optionally filtered, sorted ascending
   */
  static getFiles(dirPath: string, pattern?: RegExp): string[] {
    const files = fs.readdirSync(dirPath);
    const matching = pattern ? files.filter(f => pattern.test(f)) : files;
    return matching.sort();
  }

  static escapeCsvField(value: string): string {
    if (/[",\r\n]/.test(value)) {
      return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
  }

  static toCsv(headers: string[], rows: string[][]): string {
    const lines = [headers, ...rows].map(row => row.map(FileHelpers.escapeCsvField).join(','));
    return lines.join('\n') + '\n';
  }
}
