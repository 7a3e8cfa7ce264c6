export { importLedger } from './import-ledger.ts';
export type { ImportLedgerArgs, ImportLedgerDeps, ImportLedgerResult } from './import-ledger.ts';
export { listRecords, buildRecordFilter, selectTable } from './list-records.ts';
export type { ListRecordsArgs, ListRecordsDeps, ListRecordsResult } from './list-records.ts';
