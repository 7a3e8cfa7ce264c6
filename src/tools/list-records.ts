import { BitableClient, type RemoteRecord, type SearchFilter } from '../utils/bitableClient.ts';
import { LedgerSyncError, formatError } from '../utils/errors.ts';
import { BATCH_FIELD, KIND_FIELD, MARKER_FIELD_NAMES } from '../utils/fieldMapper.ts';
import { EXPENSE, INCOME, type TransactionKind } from '../utils/ledgerExtractor.ts';
import {
  loadSyncConfig,
  requireCredentials,
  type Credentials,
  type SyncConfig,
} from '../utils/syncConfig.ts';

/**
 * Arguments for the ls command
 */
export interface ListRecordsArgs {
  /** 'batches' (default), 'ledger', or a table id */
  table?: string;
  /** Only rows of this transaction type (收入/支出, or income/expense) */
  type?: string;
  /** Only rows of this batch number */
  batch?: string;
}

export interface ListRecordsDeps {
  configLoader?: (directory: string) => SyncConfig;
  clientFactory?: (credentials: Credentials) => BitableClient;
}

export interface ListRecordsResult {
  success: boolean;
  tableId?: string;
  filter?: SearchFilter;
  count: number;
  records: RemoteRecord[];
  error?: string;
  hint?: string;
}

type TableKind = 'batches' | 'ledger' | 'explicit';

const TYPE_ALIASES: Record<string, TransactionKind> = {
  [INCOME]: INCOME,
  [EXPENSE]: EXPENSE,
  income: INCOME,
  expense: EXPENSE,
};

/**
 * Picks the table to list
 * @returns The table id (undefined means the first sheet) and its kind
 */
export function selectTable(
  config: SyncConfig,
  table = 'batches'
): { tableId?: string; kind: TableKind } {
  if (table === 'batches') return { tableId: config.tables.batches, kind: 'batches' };
  if (table === 'ledger') return { tableId: config.tables.ledger, kind: 'ledger' };
  return { tableId: table, kind: 'explicit' };
}

/**
 * Builds the search filter for --type and --batch, combined with "and"
 * @returns undefined when neither is given
 */
export function buildRecordFilter(args: ListRecordsArgs, kind: TableKind): SearchFilter | undefined {
  const conditions: SearchFilter['conditions'] = [];

  if (args.type !== undefined) {
    if (kind === 'batches') {
      throw new LedgerSyncError('--type only applies to ledger rows', {
        hint: 'Add --table ledger',
      });
    }
    const value = TYPE_ALIASES[args.type.trim().toLowerCase()];
    if (!value) {
      throw new LedgerSyncError(`Unknown transaction type '${args.type}'`, {
        hint: `Use ${INCOME} (income) or ${EXPENSE} (expense)`,
      });
    }
    conditions.push({ field_name: KIND_FIELD, operator: 'is', value: [value] });
  }

  if (args.batch !== undefined) {
    const field = kind === 'batches' ? MARKER_FIELD_NAMES.batchNumber : BATCH_FIELD;
    conditions.push({ field_name: field, operator: 'is', value: [args.batch] });
  }

  return conditions.length > 0 ? { conjunction: 'and', conditions } : undefined;
}

function defaultClientFactory(credentials: Credentials): BitableClient {
  return new BitableClient({
    appId: credentials.appId,
    appSecret: credentials.appSecret,
    baseUrl: credentials.baseUrl,
  });
}

/**
 * Lists the records of a table, following every page
 *
 * @param directory Working directory holding config/
 */
export async function listRecords(
  directory: string,
  args: ListRecordsArgs,
  deps: ListRecordsDeps = {}
): Promise<ListRecordsResult> {
  const result: ListRecordsResult = { success: false, count: 0, records: [] };

  try {
    const config = (deps.configLoader ?? loadSyncConfig)(directory);
    const credentials = requireCredentials(config);
    const selected = selectTable(config, args.table);
    const filter = buildRecordFilter(args, selected.kind);
    if (filter) result.filter = filter;

    const client = (deps.clientFactory ?? defaultClientFactory)(credentials);
    const tableId = selected.tableId || (await client.resolveDefaultTable(credentials.appToken));
    result.tableId = tableId;

    result.records = await client.searchRecords(credentials.appToken, tableId, filter);
    result.count = result.records.length;
    result.success = true;
  } catch (error) {
    result.error = formatError(error);
    if (error instanceof LedgerSyncError && error.hint) {
      result.hint = error.hint;
    }
  }

  return result;
}
