#!/usr/bin/env tsx
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import * as path from 'path';
import { importLedger, type ImportLedgerResult } from './tools/import-ledger.ts';
import { listRecords, type ListRecordsResult } from './tools/list-records.ts';

const program = new Command();

function printFailure(error: string | undefined, hint: string | undefined): void {
  console.error(`[ERROR] ${error ?? 'unknown error'}`);
  if (hint) {
    console.error(`[HINT] ${hint}`);
  }
  process.exitCode = 1;
}

function printImport(result: ImportLedgerResult): void {
  if (!result.success) {
    printFailure(result.error, result.hint);
  } else {
    console.log(result.summary);
  }
  if (result.logFile) {
    console.log(`Log: ${result.logFile}`);
  }
}

function printRecords(result: ListRecordsResult): void {
  if (!result.success) {
    printFailure(result.error, result.hint);
    return;
  }
  for (const record of result.records) {
    const id = typeof record.record_id === 'string' ? record.record_id : '-';
    console.log(`${id}\t${JSON.stringify(record.fields ?? {})}`);
  }
  console.log(`${result.count} record(s) in table ${result.tableId}`);
}

program
  .name('ledger-sync')
  .description('Replicate exported payment ledgers into a Bitable spreadsheet');

program
  .command('import')
  .description('Import an exported ledger (.zip or .csv)')
  .argument('<file>', 'Path to the exported ledger')
  .option('--dry-run', 'Extract and map only; nothing is uploaded', false)
  .option('--strict-decoding', 'Fail when the ledger is not valid GBK', false)
  .option('-v, --verbose', 'Record debug lines in the run log', false)
  .option('--json', 'Print the result as JSON', false)
  .option('-C, --directory <dir>', 'Working directory (config/, logs)', process.cwd())
  .action(
    async (
      file: string,
      options: {
        dryRun: boolean;
        strictDecoding: boolean;
        verbose: boolean;
        json: boolean;
        directory: string;
      }
    ) => {
      const directory = path.resolve(options.directory);
      const result = await importLedger(directory, {
        file: path.resolve(file),
        dryRun: options.dryRun,
        strictDecoding: options.strictDecoding,
        verbose: options.verbose,
        echo: options.json ? undefined : (line) => console.log(line),
      });

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        if (!result.success) process.exitCode = 1;
        return;
      }
      printImport(result);
    }
  );

program
  .command('ls')
  .description('List the records of a table')
  .option('--table <table>', "'batches', 'ledger' or a table id", 'batches')
  .option('--type <type>', 'Only this transaction type (income, expense, 收入, 支出)')
  .option('--batch <batch>', 'Only this batch number')
  .option('--json', 'Print the result as JSON', false)
  .option('-C, --directory <dir>', 'Working directory (config/)', process.cwd())
  .action(
    async (options: {
      table: string;
      type?: string;
      batch?: string;
      json: boolean;
      directory: string;
    }) => {
      const result = await listRecords(path.resolve(options.directory), {
        table: options.table,
        type: options.type,
        batch: options.batch,
      });

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        if (!result.success) process.exitCode = 1;
        return;
      }
      printRecords(result);
    }
  );

await program.parseAsync();
