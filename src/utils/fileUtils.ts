import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { glob } from 'glob';
import { v4 as uuidv4 } from 'uuid';
import { ExtractionError } from './errors.ts';
import { defaultArchiveExtractor, type ArchiveExtractor } from './archiveExtractor.ts';

/**
 * Finds CSV files below a directory, at any depth
 * @returns Absolute paths, sorted
 */
export function findCSVFiles(rootDir: string): string[] {
  if (!fs.existsSync(rootDir)) {
    return [];
  }

  return glob
    .sync('**/*.csv', { cwd: rootDir, nocase: true, nodir: true, absolute: true })
    .sort();
}

export function ensureDirectory(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Runs `fn` with a fresh directory at <tmp>/ledger-sync-<uuid>, removed afterwards
 * whether `fn` resolves or throws.
 */
export async function withScratchDirectory<T>(
  fn: (scratchDir: string) => Promise<T>,
  baseDir: string = os.tmpdir()
): Promise<T> {
  const scratchDir = path.join(baseDir, `ledger-sync-${uuidv4()}`);
  ensureDirectory(scratchDir);

  try {
    return await fn(scratchDir);
  } finally {
    fs.rmSync(scratchDir, { recursive: true, force: true });
  }
}

/**
 * Places the ledger file(s) of an input into `scratchDir`: a .zip archive is
 * unpacked, anything else is copied as is.
 *
 * @returns Absolute paths of the CSV files found in `scratchDir`, sorted
 * @throws ExtractionError if the input is missing, the archive cannot be unpacked,
 *   or no CSV file is found
 */
export async function stageLedgerFiles(
  inputPath: string,
  scratchDir: string,
  extractor: ArchiveExtractor = defaultArchiveExtractor
): Promise<string[]> {
  if (!fs.existsSync(inputPath) || !fs.statSync(inputPath).isFile()) {
    throw new ExtractionError(`Input file not found: ${inputPath}`, {
      hint: 'Pass the path of the exported .zip archive or .csv file',
    });
  }

  if (path.extname(inputPath).toLowerCase() === '.zip') {
    const result = await extractor(inputPath, scratchDir);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
      throw new ExtractionError(`Failed to unpack ${path.basename(inputPath)}: ${detail}`, {
        hint: 'Check that the archive is a valid zip file and that unzip is installed',
      });
    }
  } else {
    fs.copyFileSync(inputPath, path.join(scratchDir, path.basename(inputPath)));
  }

  const csvFiles = findCSVFiles(scratchDir);
  if (csvFiles.length === 0) {
    throw new ExtractionError(`No CSV file found in ${path.basename(inputPath)}`, {
      hint: 'The export should contain the ledger as a .csv file',
    });
  }
  return csvFiles;
}
