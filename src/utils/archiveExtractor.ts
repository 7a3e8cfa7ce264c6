import { spawn } from 'child_process';

/**
 * Result of running the archive tool
 */
export interface ArchiveResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Unpacks `archivePath` into `destination` (allows dependency injection for testing)
 */
export type ArchiveExtractor = (archivePath: string, destination: string) => Promise<ArchiveResult>;

/**
 * Default extractor: runs `unzip -o -qq <archive> -d <destination>`.
 * Never rejects; a missing binary is reported as exit code 127.
 */
export function defaultArchiveExtractor(
  archivePath: string,
  destination: string
): Promise<ArchiveResult> {
  return new Promise((resolve) => {
    const child = spawn('unzip', ['-o', '-qq', archivePath, '-d', destination], {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      resolve({
        stdout,
        stderr: error.code === 'ENOENT' ? 'unzip is not installed or not on PATH' : error.message,
        exitCode: error.code === 'ENOENT' ? 127 : 1,
      });
    });
    child.on('close', (code) => {
      resolve({ stdout, stderr, exitCode: code ?? 1 });
    });
  });
}
