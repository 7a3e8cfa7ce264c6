import * as fs from 'fs';
import * as path from 'path';
import { BitableClient } from '../utils/bitableClient.ts';
import { defaultArchiveExtractor, type ArchiveExtractor } from '../utils/archiveExtractor.ts';
import { formatBatchNumber } from '../utils/dateUtils.ts';
import { LedgerSyncError, formatError } from '../utils/errors.ts';
import { stageLedgerFiles, withScratchDirectory } from '../utils/fileUtils.ts';
import { toMarkerPayload, toStorePayload, type StorePayload } from '../utils/fieldMapper.ts';
import {
  extractLedgerRows,
  type ExtractionStats,
  type RawLedgerRow,
} from '../utils/ledgerExtractor.ts';
import { createImportLogger, type LogEcho, type Logger } from '../utils/logger.ts';
import {
  loadSyncConfig,
  requireCredentials,
  requireTables,
  type Credentials,
  type SyncConfig,
} from '../utils/syncConfig.ts';

/**
 * Arguments for the import command
 */
export interface ImportLedgerArgs {
  /** Exported .zip archive or .csv file, relative to the working directory */
  file: string;
  /** Extract and map only; nothing is sent to the remote store */
  dryRun?: boolean;
  /** Record debug lines in the run log */
  verbose?: boolean;
  /** Fail on bytes that are not valid in the legacy encoding */
  strictDecoding?: boolean;
  /** Mirror log lines (e.g. to the terminal) */
  echo?: LogEcho;
}

/**
 * Replaceable collaborators of an import run
 */
export interface ImportLedgerDeps {
  configLoader?: (directory: string) => SyncConfig;
  clientFactory?: (credentials: Credentials, logger: Logger) => BitableClient;
  archiveExtractor?: ArchiveExtractor;
  /** Source of the run start time (default: now) */
  clock?: () => Date;
  /** Parent of the scratch directory (default: OS temp dir) */
  scratchBaseDir?: string;
}

interface StageStepDetails {
  files: string[];
}

interface FileExtraction {
  file: string;
  decoding: 'strict' | 'lossy';
  encoding: string;
  droppedSequences?: number;
  stats: ExtractionStats;
}

interface ExtractStepDetails {
  transactions: number;
  files: FileExtraction[];
}

interface MapStepDetails {
  records: number;
}

interface ConfigStepDetails {
  appToken: string;
  ledgerTable: string;
  batchTable: string;
}

interface MarkerStepDetails {
  tableId: string;
  recordId?: string;
}

interface UploadStepDetails {
  tableId: string;
  records: number;
}

/**
 * Result of a single import step
 */
interface StepResult<T = unknown> {
  success: boolean;
  message: string;
  details?: T;
}

/**
 * Overall result of an import run
 */
export interface ImportLedgerResult {
  success: boolean;
  batchNumber: string;
  dryRun: boolean;
  steps: {
    stage?: StepResult<StageStepDetails>;
    extract?: StepResult<ExtractStepDetails>;
    map?: StepResult<MapStepDetails>;
    config?: StepResult<ConfigStepDetails>;
    marker?: StepResult<MarkerStepDetails>;
    upload?: StepResult<UploadStepDetails>;
  };
  logFile?: string;
  summary?: string;
  error?: string;
  hint?: string;
}

type StepName = keyof ImportLedgerResult['steps'];

/**
 * Import run context
 */
interface ImportContext {
  directory: string;
  args: ImportLedgerArgs;
  config: SyncConfig;
  batchNumber: string;
  startedAt: Date;
  logger: Logger;
  result: ImportLedgerResult;
  /** Step in progress, marked failed if it throws */
  current?: StepName;
}

function buildStepResult<T>(success: boolean, message: string, details?: T): StepResult<T> {
  const result: StepResult<T> = { success, message };
  if (details !== undefined) {
    result.details = details;
  }
  return result;
}

function failedStep(message: string): StepResult<never> {
  return { success: false, message };
}

function buildSuccessResult(result: ImportLedgerResult, summary: string): ImportLedgerResult {
  result.success = true;
  result.summary = summary;
  return result;
}

function buildErrorResult(result: ImportLedgerResult, error: unknown): ImportLedgerResult {
  result.success = false;
  result.error = formatError(error);
  if (error instanceof LedgerSyncError && error.hint) {
    result.hint = error.hint;
  }
  return result;
}

function defaultClientFactory(credentials: Credentials, logger: Logger): BitableClient {
  return new BitableClient({
    appId: credentials.appId,
    appSecret: credentials.appSecret,
    baseUrl: credentials.baseUrl,
    logger,
  });
}

/**
 * Stages the input and extracts the ledger rows of every CSV found
 */
async function executeExtractSteps(
  context: ImportContext,
  scratchDir: string,
  archiveExtractor: ArchiveExtractor
): Promise<RawLedgerRow[]> {
  const { logger, result } = context;
  const inputPath = path.resolve(context.directory, context.args.file);

  context.current = 'stage';
  logger.startSection('Stage input');
  const csvFiles = await stageLedgerFiles(inputPath, scratchDir, archiveExtractor);
  const names = csvFiles.map((file) => path.relative(scratchDir, file));
  result.steps.stage = buildStepResult<StageStepDetails>(
    true,
    `Staged ${csvFiles.length} CSV file(s) from ${path.basename(inputPath)}`,
    { files: names }
  );
  logger.logStep('Stage', 'success', result.steps.stage.message);
  logger.endSection();

  context.current = 'extract';
  logger.startSection('Extract transactions');
  const rows: RawLedgerRow[] = [];
  const files: FileExtraction[] = [];

  for (const [index, csvFile] of csvFiles.entries()) {
    const name = names[index];
    const extraction = extractLedgerRows(fs.readFileSync(csvFile), context.batchNumber, {
      strictDecoding: context.args.strictDecoding,
    });
    const { decoding, stats } = extraction;

    if (decoding.kind === 'lossy' && decoding.dropped > 0) {
      logger.warn(
        `${name}: strict decoding failed (${decoding.reason}); decoded as UTF-8 dropping ${decoding.dropped} invalid sequence(s)`
      );
    } else if (decoding.kind === 'lossy') {
      logger.info(`${name}: decoded as UTF-8`);
    }
    logger.debug(
      `${name}: ${stats.lines} line(s), ${stats.candidates} candidate(s), ${stats.short} short, ${stats.filtered} neither income nor expense`
    );

    files.push({
      file: name,
      decoding: decoding.kind,
      encoding: decoding.encoding,
      ...(decoding.kind === 'lossy' ? { droppedSequences: decoding.dropped } : {}),
      stats,
    });
    rows.push(...extraction.rows);
  }

  result.steps.extract = buildStepResult<ExtractStepDetails>(
    true,
    `Extracted ${rows.length} transaction(s) from ${csvFiles.length} file(s)`,
    { transactions: rows.length, files }
  );
  logger.logStep('Extract', 'success', result.steps.extract.message);
  logger.endSection();

  return rows;
}

/**
 * Writes the marker row, then the ledger rows
 */
async function executeUploadSteps(
  context: ImportContext,
  payloads: StorePayload[],
  clientFactory: NonNullable<ImportLedgerDeps['clientFactory']>
): Promise<void> {
  const { logger, result } = context;

  context.current = 'config';
  const credentials = requireCredentials(context.config);
  const tables = requireTables(context.config);
  result.steps.config = buildStepResult<ConfigStepDetails>(
    true,
    `Using app ${credentials.appToken}`,
    { appToken: credentials.appToken, ledgerTable: tables.ledger, batchTable: tables.batches }
  );
  logger.setContext('App Token', credentials.appToken);
  logger.setContext('Ledger Table', tables.ledger);
  logger.setContext('Batch Table', tables.batches);

  const client = clientFactory(credentials, logger);

  context.current = 'marker';
  logger.startSection('Upload');
  const marker = toMarkerPayload(context.batchNumber, context.startedAt);
  const markerData = await client.insertOne(credentials.appToken, tables.batches, marker.fields);
  const record = markerData.record;
  const recordId =
    typeof record === 'object' && record !== null && 'record_id' in record && typeof record.record_id === 'string'
      ? record.record_id
      : undefined;
  result.steps.marker = buildStepResult<MarkerStepDetails>(
    true,
    `Recorded batch ${context.batchNumber} in table ${tables.batches}`,
    { tableId: tables.batches, recordId }
  );
  logger.logStep('Marker', 'success', result.steps.marker.message);

  context.current = 'upload';
  await client.batchInsert(credentials.appToken, tables.ledger, payloads);
  result.steps.upload = buildStepResult<UploadStepDetails>(
    true,
    `Inserted ${payloads.length} record(s) into table ${tables.ledger}`,
    { tableId: tables.ledger, records: payloads.length }
  );
  logger.logStep('Upload', 'success', result.steps.upload.message);
  logger.endSection();
}

/**
 * Imports one exported ledger into the remote store.
 *
 * The run is tagged with a batch number taken from the clock at start. Every
 * step is recorded in `steps`; the first failure ends the run. Marker and ledger
 * rows are written by separate requests, so a failed upload leaves the marker.
 *
 * @param directory Working directory (config/, relative input path, log dir)
 */
export async function importLedger(
  directory: string,
  args: ImportLedgerArgs,
  deps: ImportLedgerDeps = {}
): Promise<ImportLedgerResult> {
  const startedAt = (deps.clock ?? (() => new Date()))();
  const batchNumber = formatBatchNumber(startedAt);
  const result: ImportLedgerResult = {
    success: false,
    batchNumber,
    dryRun: args.dryRun ?? false,
    steps: {},
  };

  let config: SyncConfig;
  try {
    config = (deps.configLoader ?? loadSyncConfig)(directory);
  } catch (error) {
    result.steps.config = failedStep(`Failed to load configuration: ${formatError(error)}`);
    return buildErrorResult(result, error);
  }

  const logger = createImportLogger(path.resolve(directory, config.logDir), batchNumber, {
    verbose: args.verbose,
    echo: args.echo,
  });
  logger.setContext('Input', args.file);
  if (result.dryRun) logger.setContext('Mode', 'dry run');
  result.logFile = logger.getLogPath();

  const context: ImportContext = {
    directory,
    args,
    config,
    batchNumber,
    startedAt,
    logger,
    result,
  };

  try {
    await withScratchDirectory(async (scratchDir) => {
      const rows = await executeExtractSteps(
        context,
        scratchDir,
        deps.archiveExtractor ?? defaultArchiveExtractor
      );

      context.current = 'map';
      const payloads = rows.map(toStorePayload);
      result.steps.map = buildStepResult<MapStepDetails>(
        true,
        `Mapped ${payloads.length} record(s)`,
        { records: payloads.length }
      );
      logger.debug(`Mapped ${payloads.length} record(s)`);

      if (result.dryRun) {
        buildSuccessResult(
          result,
          `Dry run: ${payloads.length} transaction(s) ready to import as batch ${batchNumber}`
        );
        return;
      }

      if (payloads.length === 0) {
        buildSuccessResult(result, 'No transactions to import');
        return;
      }

      await executeUploadSteps(context, payloads, deps.clientFactory ?? defaultClientFactory);
      buildSuccessResult(
        result,
        `Imported ${payloads.length} transaction(s) as batch ${batchNumber}`
      );
    }, deps.scratchBaseDir);
  } catch (error) {
    if (context.current) {
      result.steps[context.current] = failedStep(formatError(error));
      logger.logStep(context.current, 'error', error instanceof Error ? error.message : String(error));
    }
    logger.error('Import failed', error);
    buildErrorResult(result, error);
  }

  logger.logResult({ success: result.success, summary: result.summary, error: result.error });
  await logger.flush();
  return result;
}
