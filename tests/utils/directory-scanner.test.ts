import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { scanDirectoryForReports, validateDirectory } from '@bureau-insights/report-parser';

describe('directory-scanner', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `scanner-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('validateDirectory', () => {
    it('should return valid for existing directory', async () => {
      const result = await validateDirectory(testDir);
      expect(result.valid).toBe(true);
      expect(result.error).toBeUndefined();
    });

    it('should return invalid for non-existent directory', async () => {
      const result = await validateDirectory(join(testDir, 'nonexistent'));
      expect(result.valid).toBe(false);
      expect(result.error).toContain('does not exist');
    });

    it('should return invalid for file path', async () => {
      const filePath = join(testDir, 'file.txt');
      await writeFile(filePath, 'test');
      const result = await validateDirectory(filePath);
      expect(result.valid).toBe(false);
      expect(result.error).toContain('not a directory');
    });
  });

  describe('scanDirectoryForReports', () => {
    it('should find XML files sorted by name', async () => {
      await writeFile(join(testDir, '2002.xml'), '<A/>');
      await writeFile(join(testDir, '1001.XML'), '<A/>');
      await writeFile(join(testDir, 'readme.txt'), 'not a report');
      await mkdir(join(testDir, 'nested.xml'));

      const result = await scanDirectoryForReports(testDir);

      expect(result.files.map((file) => file.fileName)).toEqual(['1001.XML', '2002.xml']);
      expect(result.files[0]?.filePath).toBe(join(testDir, '1001.XML'));
      expect(result.files[0]?.sizeBytes).toBe(4);
      expect(result.skipped).toEqual([]);
    });

    it('should skip temporary, hidden and empty files', async () => {
      await writeFile(join(testDir, '~$lock.xml'), '<A/>');
      await writeFile(join(testDir, '.hidden.xml'), '<A/>');
      await writeFile(join(testDir, 'empty.xml'), '');
      await writeFile(join(testDir, 'report.xml'), '<A/>');

      const result = await scanDirectoryForReports(testDir);

      expect(result.files.map((file) => file.fileName)).toEqual(['report.xml']);
      expect(result.skipped).toHaveLength(3);
      expect(result.skipped.find((skip) => skip.fileName === 'empty.xml')?.reason).toBe('Zero-byte file');
      expect(result.skipped.find((skip) => skip.fileName === '~$lock.xml')?.reason).toBe(
        'Temporary file (starts with ~$ or .)'
      );
    });

    it('should filter by extension and prefix', async () => {
      await writeFile(join(testDir, 'formatted_1001.json'), '{}');
      await writeFile(join(testDir, 'notes.json'), '{}');
      await writeFile(join(testDir, 'formatted_1002.xml'), '<A/>');

      const result = await scanDirectoryForReports(testDir, { extension: '.json', prefix: 'formatted_' });

      expect(result.files.map((file) => file.fileName)).toEqual(['formatted_1001.json']);
    });

    it('should return empty for a directory without reports', async () => {
      const result = await scanDirectoryForReports(testDir);
      expect(result.files).toEqual([]);
      expect(result.skipped).toEqual([]);
    });
  });
});
