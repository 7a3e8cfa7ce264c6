import { describe, it, expect } from 'vitest';
import { buildRecordFilter, listRecords, selectTable, type ListRecordsDeps } from './list-records.ts';
import { BitableClient } from '../utils/bitableClient.ts';
import type { SyncConfig } from '../utils/syncConfig.ts';
import { createStubHttp, tokenReply, TOKEN_URL, type StubHandler } from '../utils/testHelpers.ts';

const API = 'https://open.feishu.cn/open-apis';

const createMockConfig = (overrides: Partial<SyncConfig> = {}): SyncConfig => ({
  baseUrl: API,
  appId: 'cli_test',
  appSecret: 'test-secret',
  appToken: 'app1',
  tables: { ledger: 'tblLedger', batches: 'tblBatches' },
  logDir: '.memory',
  ...overrides,
});

const searchUrl = (tableId: string) =>
  `${API}/bitable/v1/apps/app1/tables/${tableId}/records/search`;

function createDeps(handler: StubHandler, config: SyncConfig = createMockConfig()) {
  const { http, requests } = createStubHttp((request) =>
    request.url === TOKEN_URL ? tokenReply() : handler(request)
  );
  const deps: ListRecordsDeps = {
    configLoader: () => config,
    clientFactory: (credentials) =>
      new BitableClient({
        appId: credentials.appId,
        appSecret: credentials.appSecret,
        baseUrl: credentials.baseUrl,
        http,
      }),
  };
  return { deps, requests };
}

const onePage = (items: unknown[]) => ({
  body: { code: 0, msg: 'success', data: { items, has_more: false, total: items.length } },
});

describe('list-records', () => {
  describe('selectTable', () => {
    const config = createMockConfig();

    it('should default to the batch table', () => {
      expect(selectTable(config)).toEqual({ tableId: 'tblBatches', kind: 'batches' });
    });

    it('should select the ledger table', () => {
      expect(selectTable(config, 'ledger')).toEqual({ tableId: 'tblLedger', kind: 'ledger' });
    });

    it('should treat anything else as a table id', () => {
      expect(selectTable(config, 'tblOther')).toEqual({ tableId: 'tblOther', kind: 'explicit' });
    });

    it('should leave an unconfigured table unresolved', () => {
      expect(selectTable(createMockConfig({ tables: {} }), 'ledger')).toEqual({
        tableId: undefined,
        kind: 'ledger',
      });
    });
  });

  describe('buildRecordFilter', () => {
    it('should return undefined without filters', () => {
      expect(buildRecordFilter({}, 'ledger')).toBeUndefined();
    });

    it('should combine type and batch with "and"', () => {
      expect(buildRecordFilter({ type: 'expense', batch: '240101_000000' }, 'ledger')).toEqual({
        conjunction: 'and',
        conditions: [
          { field_name: '收支', operator: 'is', value: ['支出'] },
          { field_name: '导入批次号', operator: 'is', value: ['240101_000000'] },
        ],
      });
    });

    it('should accept the stored type names', () => {
      expect(buildRecordFilter({ type: '收入' }, 'explicit')?.conditions).toEqual([
        { field_name: '收支', operator: 'is', value: ['收入'] },
      ]);
    });

    it('should filter the batch table by its own batch field', () => {
      expect(buildRecordFilter({ batch: '240101_000000' }, 'batches')?.conditions).toEqual([
        { field_name: '导入批次编号', operator: 'is', value: ['240101_000000'] },
      ]);
    });

    it('should reject an unknown type', () => {
      expect(() => buildRecordFilter({ type: 'refund' }, 'ledger')).toThrow(
        "Unknown transaction type 'refund'"
      );
    });

    it('should reject a type filter on the batch table', () => {
      expect(() => buildRecordFilter({ type: 'income' }, 'batches')).toThrow(
        '--type only applies to ledger rows'
      );
    });
  });

  describe('listRecords', () => {
    it('should list the batch table by default', async () => {
      const { deps, requests } = createDeps(() =>
        onePage([{ record_id: 'rec1', fields: { 导入批次编号: '240101_000000' } }])
      );

      const result = await listRecords('/unused', {}, deps);

      expect(result).toEqual({
        success: true,
        tableId: 'tblBatches',
        count: 1,
        records: [{ record_id: 'rec1', fields: { 导入批次编号: '240101_000000' } }],
      });
      expect(requests.map((r) => r.url)).toEqual([TOKEN_URL, searchUrl('tblBatches')]);
      expect(requests[1].body).toEqual({ page_size: 100, page_token: '' });
    });

    it('should send the filter with the search', async () => {
      const { deps, requests } = createDeps(() => onePage([]));

      const result = await listRecords('/unused', { table: 'ledger', type: 'income' }, deps);

      expect(result.success).toBe(true);
      expect(result.count).toBe(0);
      expect(requests[1].body).toEqual({
        page_size: 100,
        page_token: '',
        filter: {
          conjunction: 'and',
          conditions: [{ field_name: '收支', operator: 'is', value: ['收入'] }],
        },
      });
    });

    it('should fall back to the first sheet when the table is not configured', async () => {
      const { deps, requests } = createDeps((request) => {
        if (request.method === 'GET') {
          return {
            body: {
              code: 0,
              msg: 'success',
              data: { spreadsheet: { sheets: [{ sheet_id: 'shtFirst' }, { sheet_id: 'shtSecond' }] } },
            },
          };
        }
        return onePage([]);
      }, createMockConfig({ tables: {} }));

      const result = await listRecords('/unused', {}, deps);

      expect(result.tableId).toBe('shtFirst');
      expect(requests.map((r) => r.url)).toEqual([
        TOKEN_URL,
        `${API}/bitable/v1/spreadsheets/app1`,
        searchUrl('shtFirst'),
      ]);
    });

    it('should require credentials', async () => {
      const { deps, requests } = createDeps(() => onePage([]), createMockConfig({ appToken: undefined }));

      const result = await listRecords('/unused', {}, deps);

      expect(result.success).toBe(false);
      expect(result.error).toBe('Incomplete Feishu configuration: missing FEISHU_APP_TOKEN');
      expect(requests).toHaveLength(0);
    });

    it('should report a failed search without partial records', async () => {
      const { deps } = createDeps(() => ({ status: 403, body: { code: 91403, msg: 'Forbidden' } }));

      const result = await listRecords('/unused', { table: 'tblOther' }, deps);

      expect(result).toEqual({
        success: false,
        tableId: 'tblOther',
        count: 0,
        records: [],
        error:
          'Failed to fetch page 1 of table tblOther (app app1): Forbidden (HTTP 403, code 91403) ' +
          '[/bitable/v1/apps/app1/tables/tblOther/records/search]',
      });
    });

    it('should carry the hint of an invalid filter', async () => {
      const { deps } = createDeps(() => onePage([]));

      const result = await listRecords('/unused', { table: 'ledger', type: 'refund' }, deps);

      expect(result.success).toBe(false);
      expect(result.hint).toBe('Use 收入 (income) or 支出 (expense)');
    });
  });
});
