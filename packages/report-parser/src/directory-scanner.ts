import { readdir, stat } from 'fs/promises';
import { join, extname, normalize } from 'path';

export interface ReportFileInfo {
  filePath: string;
  fileName: string;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface ScanResult {
  files: ReportFileInfo[];
  skipped: Array<{ fileName: string; reason: string }>;
  directoryPath: string;
}

export interface ScanOptions {
  /** File extension to collect, case-insensitive (default: `.xml`). */
  extension?: string;
  /** Only collect files whose name starts with this prefix. */
  prefix?: string;
}

const TEMPORARY_PREFIXES = ['~$', '.'] as const;

function matches(fileName: string, extension: string, prefix: string | undefined): boolean {
  if (extname(fileName).toLowerCase() !== extension) return false;
  return prefix === undefined || fileName.startsWith(prefix);
}

/**
 * Lists the report (or interim) files of a directory, sorted by name.
 * Lock files, hidden files and empty files are reported in `skipped`.
 */
export async function scanDirectoryForReports(directoryPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const extension = (options.extension ?? '.xml').toLowerCase();
  const root = normalize(directoryPath);
  const result: ScanResult = { files: [], skipped: [], directoryPath: root };

  const entries = await readdir(root, { withFileTypes: true });
  const candidates = entries.filter((entry) => !entry.isDirectory() && matches(entry.name, extension, options.prefix));

  for (const { name: fileName } of candidates) {
    if (TEMPORARY_PREFIXES.some((prefix) => fileName.startsWith(prefix))) {
      result.skipped.push({ fileName, reason: 'Temporary file (starts with ~$ or .)' });
      continue;
    }

    const filePath = join(root, fileName);
    const { size, mtime } = await stat(filePath);
    if (size === 0) {
      result.skipped.push({ fileName, reason: 'Zero-byte file' });
      continue;
    }

    result.files.push({ filePath, fileName, sizeBytes: size, modifiedAt: mtime });
  }

  result.files.sort((a, b) => a.fileName.localeCompare(b.fileName));
  return result;
}

const ACCESS_ERRORS: Readonly<Record<string, string>> = {
  ENOENT: 'Directory does not exist',
  EACCES: 'Permission denied',
};

/**
 * Checks that a path exists and is a directory the process can stat.
 */
export async function validateDirectory(directoryPath: string): Promise<{ valid: boolean; error?: string }> {
  try {
    const info = await stat(normalize(directoryPath));
    return info.isDirectory()
      ? { valid: true }
      : { valid: false, error: `Path is not a directory: ${directoryPath}` };
  } catch (error) {
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : '';
    return { valid: false, error: `${ACCESS_ERRORS[code] ?? 'Cannot access directory'}: ${directoryPath}` };
  }
}
