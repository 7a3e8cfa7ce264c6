import type { RawLedgerRow } from './ledgerExtractor.ts';
import { parseLedgerDateTime } from './dateUtils.ts';

export type FieldValue = string | number;

/**
 * Record body accepted by the Bitable create endpoints
 */
export interface StorePayload {
  fields: Record<string, FieldValue>;
}

/**
 * Ledger row key → Bitable column name. Row keys not listed here are not sent.
 */
export const LEDGER_FIELD_NAMES = {
  uniqueId: '唯一字段',
  occurredAt: '日期',
  amount: '金额',
  memo: '备注',
  kind: '收支',
  batchNumber: '导入批次号',
} as const satisfies Partial<Record<keyof RawLedgerRow, string>>;

const MAPPED_KEYS: ReadonlyArray<keyof typeof LEDGER_FIELD_NAMES> = [
  'uniqueId',
  'occurredAt',
  'amount',
  'memo',
  'kind',
  'batchNumber',
];

export const DATE_FIELD = LEDGER_FIELD_NAMES.occurredAt;
export const AMOUNT_FIELD = LEDGER_FIELD_NAMES.amount;
export const KIND_FIELD = LEDGER_FIELD_NAMES.kind;
export const BATCH_FIELD = LEDGER_FIELD_NAMES.batchNumber;

/** Columns of the marker row written once per run */
export const MARKER_FIELD_NAMES = {
  batchNumber: '导入批次编号',
  startedAt: '时间',
} as const;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a decimal amount such as "100.50" or "-3"
 *
 * @returns The number, or null if the text is not a finite decimal
 */
export function parseAmount(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const amount = Number(trimmed);
  return Number.isFinite(amount) ? amount : null;
}

/**
 * Converts an extracted ledger row into a Bitable record body.
 *
 * The date becomes epoch milliseconds and the amount a number; either is sent
 * as the original text when it does not parse.
 */
export function toStorePayload(row: Partial<RawLedgerRow>): StorePayload {
  const fields: Record<string, FieldValue> = {};

  for (const key of MAPPED_KEYS) {
    const value = row[key];
    if (value !== undefined) {
      fields[LEDGER_FIELD_NAMES[key]] = value;
    }
  }

  const date = fields[DATE_FIELD];
  if (typeof date === 'string') {
    const epochMs = parseLedgerDateTime(date);
    if (epochMs !== null) fields[DATE_FIELD] = epochMs;
  }

  const amount = fields[AMOUNT_FIELD];
  if (typeof amount === 'string') {
    const parsed = parseAmount(amount);
    if (parsed !== null) fields[AMOUNT_FIELD] = parsed;
  }

  return { fields };
}

/**
 * Builds the marker row recording that a batch was imported
 */
export function toMarkerPayload(batchNumber: string, startedAt: Date): StorePayload {
  return {
    fields: {
      [MARKER_FIELD_NAMES.batchNumber]: batchNumber,
      [MARKER_FIELD_NAMES.startedAt]: startedAt.getTime(),
    },
  };
}
