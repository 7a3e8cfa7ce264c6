import fs from 'fs/promises';
import path from 'path';

/**
 * Logger interface for structured logging to markdown files
 */
export interface Logger {
  /** Start a new section in the log */
  startSection(title: string): void;
  /** End the current section */
  endSection(): void;
  /** Log informational message */
  info(message: string): void;
  /** Log warning message */
  warn(message: string): void;
  /** Log error message with optional error object */
  error(message: string, error?: Error | unknown): void;
  /** Log debug message (recorded only when verbose) */
  debug(message: string): void;
  /** Log a step with status indicator */
  logStep(stepName: string, status: 'success' | 'error', details?: string): void;
  /** Log structured data as JSON */
  logResult(data: Record<string, unknown>): void;
  /** Set context metadata */
  setContext(key: string, value: string): void;
  /** Write everything logged so far to the log file */
  flush(): Promise<void>;
  /** Get the log file path */
  getLogPath(): string;
}

/**
 * Receives a plain-text copy of each log line (e.g. the terminal)
 */
export type LogEcho = (line: string) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Directory where log files are stored */
  logDir: string;
  /** Optional filename (defaults to import-<timestamp>.md) */
  filename?: string;
  /** Heading of the log file */
  title?: string;
  /** Auto-flush after each log (default: true) */
  autoFlush?: boolean;
  /** Record debug messages (default: false) */
  verbose?: boolean;
  /** Mirror log lines as plain text */
  echo?: LogEcho;
  /** Initial context metadata */
  context?: Record<string, string>;
}

/**
 * Markdown-based logger implementation
 */
class MarkdownLogger implements Logger {
  private buffer: string[] = [];
  private logPath: string;
  private context: Record<string, string> = {};
  private autoFlush: boolean;
  private verbose: boolean;
  private echo?: LogEcho;
  private sectionDepth: number = 0;
  private writes: Promise<void> = Promise.resolve();
  private writeFailed = false;

  constructor(config: LoggerConfig) {
    this.autoFlush = config.autoFlush ?? true;
    this.verbose = config.verbose ?? false;
    this.echo = config.echo;
    this.context = { ...(config.context ?? {}) };

    const filename = config.filename || `import-${this.getTimestamp()}.md`;
    this.logPath = path.join(config.logDir, filename);

    this.buffer.push(`# ${config.title ?? 'Ledger Import Log'}`);
    this.buffer.push(`**Started**: ${new Date().toLocaleString()}`);
    for (const [key, value] of Object.entries(this.context)) {
      this.buffer.push(`**${key}**: ${value}`);
    }
    this.buffer.push('');
  }

  startSection(title: string): void {
    this.buffer.push('');
    this.buffer.push(`### ${title}`);
    this.buffer.push(`**Started**: ${this.getTime()}`);
    this.buffer.push('');
    this.sectionDepth++;
  }

  endSection(): void {
    if (this.sectionDepth > 0) {
      this.buffer.push('');
      this.buffer.push('---');
      this.buffer.push('');
      this.sectionDepth--;
    }
  }

  info(message: string): void {
    this.buffer.push(message);
    this.echo?.(message);
    this.afterWrite();
  }

  warn(message: string): void {
    this.buffer.push(`⚠️ **WARNING**: ${message}`);
    this.echo?.(`warning: ${message}`);
    this.afterWrite();
  }

  error(message: string, error?: Error | unknown): void {
    this.buffer.push(`❌ **ERROR**: ${message}`);
    this.echo?.(`error: ${message}`);
    if (error) {
      const errorStr = error instanceof Error ? error.message : String(error);
      this.buffer.push('');
      this.buffer.push('```');
      this.buffer.push(errorStr);
      if (error instanceof Error && error.stack) {
        this.buffer.push('');
        this.buffer.push(error.stack);
      }
      this.buffer.push('```');
      this.buffer.push('');
    }
    this.afterWrite();
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.buffer.push(`🔍 ${message}`);
    this.echo?.(`[debug] ${message}`);
    this.afterWrite();
  }

  logStep(stepName: string, status: 'success' | 'error', details?: string): void {
    const icon = status === 'success' ? '✅' : '❌';
    const statusText = status.charAt(0).toUpperCase() + status.slice(1);

    this.buffer.push(`**${stepName}**: ${icon} ${statusText}`);
    if (details) {
      this.buffer.push(`  ${details}`);
    }
    this.buffer.push('');
    this.echo?.(`${stepName}: ${status}${details ? ` (${details})` : ''}`);
    this.afterWrite();
  }

  logResult(data: Record<string, unknown>): void {
    const json = JSON.stringify(data, null, 2);
    this.buffer.push('```json');
    this.buffer.push(json);
    this.buffer.push('```');
    this.buffer.push('');
    if (this.verbose) this.echo?.(json);
    this.afterWrite();
  }

  setContext(key: string, value: string): void {
    this.context[key] = value;
    this.buffer.push(`**${key}**: ${value}`);
  }

  async flush(): Promise<void> {
    this.scheduleWrite();
    await this.writes;
  }

  getLogPath(): string {
    return this.logPath;
  }

  private afterWrite(): void {
    if (this.autoFlush) this.scheduleWrite();
  }

  // Writes are chained so a slow write never lands after a newer one
  private scheduleWrite(): void {
    this.writes = this.writes.then(() => this.write());
  }

  private async write(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.logPath), { recursive: true });
      await fs.writeFile(this.logPath, this.buffer.join('\n'), 'utf-8');
    } catch (error) {
      // Reported once; the run continues without a log file
      if (!this.writeFailed) {
        this.writeFailed = true;
        const reason = error instanceof Error ? error.message : String(error);
        process.stderr.write(`Could not write log file ${this.logPath}: ${reason}\n`);
      }
    }
  }

  private getTimestamp(): string {
    return new Date().toISOString().replace(/:/g, '-').split('.')[0];
  }

  private getTime(): string {
    return new Date().toLocaleTimeString();
  }
}

/**
 * Factory function to create a logger
 */
export function createLogger(config: LoggerConfig): Logger {
  return new MarkdownLogger(config);
}

/**
 * Options for a per-run logger
 */
export interface RunLoggerOptions {
  verbose?: boolean;
  echo?: LogEcho;
}

/**
 * Convenience function to create the logger of one import run.
 * The file is named after the batch number so runs never overwrite each other.
 */
export function createImportLogger(
  logDir: string,
  batchNumber: string,
  options: RunLoggerOptions = {}
): Logger {
  return createLogger({
    logDir,
    filename: `import-${batchNumber}.md`,
    title: `Ledger Import ${batchNumber}`,
    autoFlush: true,
    verbose: options.verbose,
    echo: options.echo,
    context: { 'Batch Number': batchNumber },
  });
}
