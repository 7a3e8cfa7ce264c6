/**
 * Ledger extraction for provider CSV exports.
 *
 * The export has no header row usable across versions: transaction lines are
 * recognised by their leading 8-digit transaction number and read by column
 * position. Everything else (title block, column captions, summary footer) is
 * skipped.
 */

import Papa from 'papaparse';
import { DecodeError } from './errors.ts';

export type TransactionKind = '收入' | '支出';

export const INCOME: TransactionKind = '收入';
export const EXPENSE: TransactionKind = '支出';

/**
 * One transaction line that survived extraction
 */
export interface RawLedgerRow {
  uniqueId: string;
  occurredAt: string;
  amount: string;
  memo: string;
  kind: TransactionKind;
  source: string;
  batchNumber: string;
}

/**
 * Positional layout of a provider export
 */
export interface LedgerFormat {
  /** Tag stamped into every row's `source` */
  source: string;
  /** Lines not matching this are treated as headers/footers */
  linePattern: RegExp;
  delimiter: string;
  /** Lines yielding fewer columns are dropped */
  minColumns: number;
  columns: {
    uniqueId: number;
    occurredAt: number;
    memo: number;
    amount: number;
    kind: number;
  };
  kinds: readonly TransactionKind[];
}

export const ALIPAY_FORMAT: LedgerFormat = {
  source: 'alipay',
  linePattern: /^\d{8}/,
  delimiter: ',',
  minColumns: 11,
  columns: { uniqueId: 0, occurredAt: 3, memo: 8, amount: 9, kind: 10 },
  kinds: [INCOME, EXPENSE],
};

/**
 * Which decoding branch produced the text
 */
export type DecodeOutcome =
  | { kind: 'strict'; encoding: string; text: string }
  | { kind: 'lossy'; encoding: string; text: string; dropped: number; reason: string }
  | { kind: 'failed'; attempted: string[]; reason: string };

export interface DecodeOptions {
  /** Encoding tried first, in fatal mode (default: gbk) */
  legacyEncoding?: string;
  /** Fail instead of falling back to lossy UTF-8 */
  strictDecoding?: boolean;
}

const REPLACEMENT_CHAR = /\uFFFD/g;

/**
 * Decodes ledger bytes: the legacy encoding strictly, then UTF-8 dropping
 * invalid sequences.
 */
export function decodeLedger(bytes: Uint8Array, options: DecodeOptions = {}): DecodeOutcome {
  const legacyEncoding = options.legacyEncoding ?? 'gbk';

  let reason: string;
  try {
    const text = new TextDecoder(legacyEncoding, { fatal: true }).decode(bytes);
    return { kind: 'strict', encoding: legacyEncoding, text };
  } catch (error) {
    // RangeError: encoding unsupported by this runtime; TypeError: invalid bytes
    reason = error instanceof Error ? error.message : String(error);
  }

  if (options.strictDecoding) {
    return { kind: 'failed', attempted: [legacyEncoding], reason };
  }

  const replaced = new TextDecoder('utf-8').decode(bytes);
  const dropped = replaced.match(REPLACEMENT_CHAR)?.length ?? 0;
  return {
    kind: 'lossy',
    encoding: 'utf-8',
    text: replaced.replace(REPLACEMENT_CHAR, ''),
    dropped,
    reason,
  };
}

/**
 * Line counters, useful for explaining an empty result
 */
export interface ExtractionStats {
  /** Non-blank lines */
  lines: number;
  /** Lines that look like transactions */
  candidates: number;
  /** Candidates with too few columns */
  short: number;
  /** Complete candidates whose kind is neither income nor expense */
  filtered: number;
  /** Rows returned */
  rows: number;
}

export interface Extraction {
  rows: RawLedgerRow[];
  decoding: Exclude<DecodeOutcome, { kind: 'failed' }>;
  stats: ExtractionStats;
}

export interface ExtractOptions extends DecodeOptions {
  format?: LedgerFormat;
}

/**
 * Splits one line into columns. Well-formed quoting is honoured; a line whose
 * quotes do not parse, or that parses to too few columns, is split on every
 * delimiter so column indices match the plain layout.
 */
function splitColumns(line: string, delimiter: string, minColumns: number): string[] {
  const parsed = Papa.parse<string[]>(line, { delimiter, header: false });
  const columns = parsed.data[0] ?? [];
  if (parsed.errors.length > 0 || columns.length < minColumns) {
    return line.split(delimiter);
  }
  return columns;
}

function isKnownKind(value: string, kinds: readonly TransactionKind[]): value is TransactionKind {
  return kinds.some((kind) => kind === value);
}

/**
 * Extracts transaction rows from already-decoded ledger text
 */
export function extractFromText(
  text: string,
  batchNumber: string,
  format: LedgerFormat = ALIPAY_FORMAT
): { rows: RawLedgerRow[]; stats: ExtractionStats } {
  const stats: ExtractionStats = { lines: 0, candidates: 0, short: 0, filtered: 0, rows: 0 };
  const rows: RawLedgerRow[] = [];
  const { columns: at } = format;

  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    stats.lines++;

    if (!format.linePattern.test(trimmed)) continue;
    stats.candidates++;

    const columns = splitColumns(trimmed, format.delimiter, format.minColumns);
    if (columns.length < format.minColumns) {
      stats.short++;
      continue;
    }

    const kind = (columns[at.kind] ?? '').trim();
    if (!isKnownKind(kind, format.kinds)) {
      stats.filtered++;
      continue;
    }

    rows.push({
      uniqueId: (columns[at.uniqueId] ?? '').trim(),
      occurredAt: (columns[at.occurredAt] ?? '').trim(),
      amount: (columns[at.amount] ?? '').trim(),
      memo: (columns[at.memo] ?? '').trim(),
      kind,
      source: format.source,
      batchNumber,
    });
  }

  stats.rows = rows.length;
  return { rows, stats };
}

/**
 * Extracts income/expense rows from a raw ledger export
 *
 * @param bytes - File contents
 * @param batchNumber - Run-scoped batch number stamped into every row
 * @throws DecodeError if strict decoding was requested and the legacy encoding fails
 *
 * @example
 * const { rows } = extractLedgerRows(fs.readFileSync(csvPath), '240101_000000');
 */
export function extractLedgerRows(
  bytes: Uint8Array,
  batchNumber: string,
  options: ExtractOptions = {}
): Extraction {
  const decoding = decodeLedger(bytes, options);
  if (decoding.kind === 'failed') {
    throw new DecodeError(decoding.attempted, {
      hint: `Decoder said: ${decoding.reason}. Re-export the ledger or disable strict decoding.`,
    });
  }

  const { rows, stats } = extractFromText(decoding.text, batchNumber, options.format);
  return { rows, decoding, stats };
}
