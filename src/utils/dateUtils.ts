/**
 * Date utility functions for batch numbers and ledger timestamps
 */

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a Date as a batch number (YYMMDD_HHMMSS, local time)
 *
 * @param date - The run start time
 * @returns Batch number string
 *
 * @example
 * ```typescript
 * formatBatchNumber(new Date(2024, 0, 1, 9, 5, 3)) // '240101_090503'
 * ```
 */
export function formatBatchNumber(date: Date): string {
  const yy = pad2(date.getFullYear() % 100);
  const mmdd = `${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${yy}${mmdd}_${time}`;
}

const LEDGER_DATE_TIME = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/;

/**
 * Parses a ledger timestamp (YYYY-MM-DD HH:MM:SS, local time; parts after the year may be unpadded) to epoch milliseconds
 *
 * Components outside their calendar range (month 13, Feb 30, hour 24, ...) are
 * rejected rather than rolled over.
 *
 * @param value - Timestamp text from the ledger
 * @returns Epoch milliseconds, or null if the text does not match the format
 *
 * @example
 * ```typescript
 * parseLedgerDateTime('2024-01-02 10:00:00') // new Date(2024, 0, 2, 10, 0, 0).getTime()
 * parseLedgerDateTime('2024/01/02')          // null
 * ```
 */
export function parseLedgerDateTime(value: string): number | null {
  const match = value.match(LEDGER_DATE_TIME);
  if (!match) return null;

  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
  const date = new Date(year, month - 1, day, hours, minutes, seconds);

  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    date.getHours() !== hours ||
    date.getMinutes() !== minutes ||
    date.getSeconds() !== seconds
  ) {
    return null;
  }

  return date.getTime();
}
