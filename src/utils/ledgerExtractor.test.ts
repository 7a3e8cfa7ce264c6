import { describe, it, expect } from 'vitest';
import {
  ALIPAY_FORMAT,
  decodeLedger,
  extractFromText,
  extractLedgerRows,
  type RawLedgerRow,
} from './ledgerExtractor.ts';
import { DecodeError } from './errors.ts';
import { encodeGbk as gbk } from './testHelpers.ts';

const BATCH = '240101_000000';
const EXAMPLE_LINE = '12345678,a,b,2024-01-02 10:00:00,e,f,g,h,memoX,100.50,支出';

const EXAMPLE_ROW: RawLedgerRow = {
  uniqueId: '12345678',
  occurredAt: '2024-01-02 10:00:00',
  amount: '100.50',
  memo: 'memoX',
  kind: '支出',
  source: 'alipay',
  batchNumber: BATCH,
};

describe('ledgerExtractor', () => {
  describe('decodeLedger', () => {
    it('takes the strict branch for valid GBK bytes', () => {
      const outcome = decodeLedger(gbk('收入,支出'));

      expect(outcome).toEqual({ kind: 'strict', encoding: 'gbk', text: '收入,支出' });
    });

    it('takes the strict branch for plain ASCII', () => {
      const outcome = decodeLedger(gbk('12345678,abc'));

      expect(outcome.kind).toBe('strict');
    });

    it('falls back to lossy UTF-8 and drops invalid sequences', () => {
      const bytes = Buffer.concat([Buffer.from('abc,支出', 'utf-8'), Buffer.from([0xff])]);

      const outcome = decodeLedger(bytes);

      expect(outcome.kind).toBe('lossy');
      if (outcome.kind !== 'lossy') return;
      expect(outcome.encoding).toBe('utf-8');
      expect(outcome.text).toBe('abc,支出');
      expect(outcome.dropped).toBe(1);
    });

    it('falls back when the legacy encoding is not supported', () => {
      const outcome = decodeLedger(Buffer.from('abc', 'utf-8'), {
        legacyEncoding: 'x-no-such-encoding',
      });

      expect(outcome.kind).toBe('lossy');
      if (outcome.kind !== 'lossy') return;
      expect(outcome.text).toBe('abc');
      expect(outcome.dropped).toBe(0);
    });

    it('reports failure instead of falling back in strict mode', () => {
      const outcome = decodeLedger(Uint8Array.from([0x41, 0xff]), { strictDecoding: true });

      expect(outcome.kind).toBe('failed');
      if (outcome.kind !== 'failed') return;
      expect(outcome.attempted).toEqual(['gbk']);
    });

    it('honours a custom legacy encoding', () => {
      const outcome = decodeLedger(Buffer.from('支出', 'utf-8'), { legacyEncoding: 'utf-8' });

      expect(outcome).toEqual({ kind: 'strict', encoding: 'utf-8', text: '支出' });
    });
  });

  describe('extractFromText', () => {
    it('extracts the positional fields of a transaction line', () => {
      const { rows } = extractFromText(EXAMPLE_LINE, BATCH);

      expect(rows).toEqual([EXAMPLE_ROW]);
    });

    it('skips lines that do not start with 8 digits', () => {
      const text = [
        '------------------------支付宝交易记录明细查询-----------------',
        '账号:[test@example.com]',
        '交易号,商家订单号,交易创建时间,付款时间,最近修改时间,交易来源地,类型,交易对方,商品名称,金额（元）,收/支',
        '1234567,a,b,2024-01-02 10:00:00,e,f,g,h,memo,1.00,支出',
        'x12345678,a,b,2024-01-02 10:00:00,e,f,g,h,memo,1.00,支出',
        '共1笔记录',
      ].join('\n');

      const { rows, stats } = extractFromText(text, BATCH);

      expect(rows).toEqual([]);
      expect(stats).toEqual({ lines: 6, candidates: 0, short: 0, filtered: 0, rows: 0 });
    });

    it('keeps lines whose leading number is longer than 8 digits', () => {
      const { rows } = extractFromText(
        '2024010222001,a,b,2024-01-02 10:00:00,e,f,g,h,memo,1.00,收入',
        BATCH
      );

      expect(rows).toHaveLength(1);
      expect(rows[0].uniqueId).toBe('2024010222001');
      expect(rows[0].kind).toBe('收入');
    });

    it('drops candidate lines with fewer than 11 columns', () => {
      const { rows, stats } = extractFromText(
        '12345678,a,b,2024-01-02 10:00:00,e,f,g,h,memoX,支出',
        BATCH
      );

      expect(rows).toEqual([]);
      expect(stats.candidates).toBe(1);
      expect(stats.short).toBe(1);
    });

    it('keeps only income and expense rows', () => {
      const text = [
        '10000001,a,b,2024-01-02 10:00:00,e,f,g,h,refund,5.00,收入',
        '10000002,a,b,2024-01-02 11:00:00,e,f,g,h,internal,7.00,不计收支',
        '10000003,a,b,2024-01-02 12:00:00,e,f,g,h,blank,9.00,',
        '10000004,a,b,2024-01-02 13:00:00,e,f,g,h,coffee,3.00,支出',
      ].join('\n');

      const { rows, stats } = extractFromText(text, BATCH);

      expect(rows.map((row) => row.uniqueId)).toEqual(['10000001', '10000004']);
      expect(rows.map((row) => row.kind)).toEqual(['收入', '支出']);
      expect(stats.filtered).toBe(2);
    });

    it('trims fields and tolerates CRLF and surrounding whitespace', () => {
      const text =
        '  12345678 ,a,b, 2024-01-02 10:00:00 ,e,f,g,h,  memoX\t, 100.50 , 支出 \r\n\r\n';

      const { rows } = extractFromText(text, BATCH);

      expect(rows).toEqual([EXAMPLE_ROW]);
    });

    it('keeps column indices stable for extra trailing columns', () => {
      const { rows } = extractFromText(`${EXAMPLE_LINE},交易成功,0.00,,`, BATCH);

      expect(rows).toEqual([EXAMPLE_ROW]);
    });

    it('treats a quoted comma as part of its field', () => {
      const { rows } = extractFromText(
        '12345678,a,b,2024-01-02 10:00:00,e,f,g,"Shop, Ltd",memoX,100.50,支出',
        BATCH
      );

      expect(rows).toEqual([EXAMPLE_ROW]);
    });

    it('keeps a row whose memo starts with a quote', () => {
      const { rows, stats } = extractFromText(
        '12345678,a,b,2024-01-02 10:00:00,e,f,g,h,"双11"活动,100.50,支出',
        BATCH
      );

      expect(rows).toEqual([{ ...EXAMPLE_ROW, memo: '"双11"活动' }]);
      expect(stats.short).toBe(0);
    });

    it('keeps a row with an unclosed quote', () => {
      const { rows, stats } = extractFromText(
        '12345678,a,b,2024-01-02 10:00:00,e,f,g,"Shop,memoX,100.50,支出',
        BATCH
      );

      expect(rows).toEqual([EXAMPLE_ROW]);
      expect(stats.short).toBe(0);
    });

    it('still counts a genuinely short line', () => {
      const { rows, stats } = extractFromText('12345678,a,b,2024-01-02 10:00:00,支出', BATCH);

      expect(rows).toEqual([]);
      expect(stats.short).toBe(1);
    });

    it('stamps the source tag of the format', () => {
      const { rows } = extractFromText(EXAMPLE_LINE, BATCH, {
        ...ALIPAY_FORMAT,
        source: 'other-provider',
      });

      expect(rows[0].source).toBe('other-provider');
    });
  });

  describe('extractLedgerRows', () => {
    it('extracts rows from GBK bytes', () => {
      const bytes = gbk(`header line\n${EXAMPLE_LINE}\n`);

      const result = extractLedgerRows(bytes, BATCH);

      expect(result.decoding.kind).toBe('strict');
      expect(result.rows).toEqual([EXAMPLE_ROW]);
      expect(result.stats.rows).toBe(1);
    });

    it('extracts rows through the lossy branch', () => {
      const bytes = Buffer.concat([Buffer.from(`${EXAMPLE_LINE}\n`, 'utf-8'), Buffer.from([0xff])]);

      const result = extractLedgerRows(bytes, BATCH);

      expect(result.decoding.kind).toBe('lossy');
      expect(result.rows).toEqual([EXAMPLE_ROW]);
    });

    it('throws DecodeError when strict decoding fails', () => {
      const bytes = Uint8Array.from([0x31, 0xff]);

      expect(() => extractLedgerRows(bytes, BATCH, { strictDecoding: true })).toThrow(DecodeError);
    });

    it('returns no rows for an empty file', () => {
      const result = extractLedgerRows(new Uint8Array(0), BATCH);

      expect(result.rows).toEqual([]);
      expect(result.stats.lines).toBe(0);
    });
  });
});
