import { describe, it, expect } from 'vitest';
import { formatBatchNumber, parseLedgerDateTime } from './dateUtils.ts';

describe('dateUtils', () => {
  describe('formatBatchNumber', () => {
    it('formats as YYMMDD_HHMMSS', () => {
      expect(formatBatchNumber(new Date(2024, 0, 1, 0, 0, 0))).toBe('240101_000000');
    });

    it('zero-pads every component', () => {
      expect(formatBatchNumber(new Date(2009, 2, 4, 5, 6, 7))).toBe('090304_050607');
    });

    it('handles the last second of the year', () => {
      expect(formatBatchNumber(new Date(2025, 11, 31, 23, 59, 59))).toBe('251231_235959');
    });
  });

  describe('parseLedgerDateTime', () => {
    it('returns epoch milliseconds in local time', () => {
      expect(parseLedgerDateTime('2024-01-02 10:00:00')).toBe(
        new Date(2024, 0, 2, 10, 0, 0).getTime()
      );
    });

    it('handles leap days', () => {
      expect(parseLedgerDateTime('2024-02-29 23:59:59')).toBe(
        new Date(2024, 1, 29, 23, 59, 59).getTime()
      );
    });

    it('accepts unpadded components', () => {
      expect(parseLedgerDateTime('2024-1-2 9:05:07')).toBe(new Date(2024, 0, 2, 9, 5, 7).getTime());
      expect(parseLedgerDateTime('2024-12-2 10:0:0')).toBe(new Date(2024, 11, 2, 10, 0, 0).getTime());
    });

    it('rejects other layouts', () => {
      expect(parseLedgerDateTime('2024/01/02 10:00:00')).toBeNull();
      expect(parseLedgerDateTime('2024-01-02')).toBeNull();
      expect(parseLedgerDateTime('2024-01-02T10:00:00')).toBeNull();
      expect(parseLedgerDateTime(' 2024-01-02 10:00:00')).toBeNull();
      expect(parseLedgerDateTime('')).toBeNull();
    });

    it('rejects out-of-range components instead of rolling over', () => {
      expect(parseLedgerDateTime('2024-13-01 00:00:00')).toBeNull();
      expect(parseLedgerDateTime('2023-02-29 00:00:00')).toBeNull();
      expect(parseLedgerDateTime('2024-01-01 24:00:00')).toBeNull();
      expect(parseLedgerDateTime('2024-01-01 12:60:00')).toBeNull();
    });
  });
});
