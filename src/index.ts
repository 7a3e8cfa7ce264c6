export * from './tools/index.ts';
export {
  BitableClient,
  DEFAULT_BASE_URL,
  DEFAULT_PAGE_SIZE,
  SUCCESS_CODE,
} from './utils/bitableClient.ts';
export type {
  BitableClientOptions,
  RemoteRecord,
  SearchFilter,
  SheetInfo,
} from './utils/bitableClient.ts';
export {
  ALIPAY_FORMAT,
  EXPENSE,
  INCOME,
  decodeLedger,
  extractFromText,
  extractLedgerRows,
} from './utils/ledgerExtractor.ts';
export type {
  DecodeOutcome,
  Extraction,
  ExtractionStats,
  LedgerFormat,
  RawLedgerRow,
  TransactionKind,
} from './utils/ledgerExtractor.ts';
export {
  LEDGER_FIELD_NAMES,
  MARKER_FIELD_NAMES,
  parseAmount,
  toMarkerPayload,
  toStorePayload,
} from './utils/fieldMapper.ts';
export type { FieldValue, StorePayload } from './utils/fieldMapper.ts';
export { formatBatchNumber, parseLedgerDateTime } from './utils/dateUtils.ts';
export { loadSyncConfig, requireCredentials, requireTables } from './utils/syncConfig.ts';
export type { Credentials, SyncConfig, TableIds } from './utils/syncConfig.ts';
export * from './utils/errors.ts';
