import axios, { type AxiosInstance } from 'axios';
import {
  AuthError,
  BatchInsertError,
  InsertError,
  RecordFetchError,
  SheetResolutionError,
  type RemoteFailure,
} from './errors.ts';
import type { FieldValue, StorePayload } from './fieldMapper.ts';
import type { Logger } from './logger.ts';

export const DEFAULT_BASE_URL = 'https://open.feishu.cn/open-apis';

/** Application-level success code inside every response body */
export const SUCCESS_CODE = 0;

export const DEFAULT_PAGE_SIZE = 100;

/**
 * A record as returned by the search endpoint (record_id, fields, ...)
 */
export type RemoteRecord = Record<string, unknown>;

/**
 * A sheet entry of the describe-spreadsheet response
 */
export interface SheetInfo {
  sheet_id: string;
  title?: string;
  index?: number;
}

/**
 * Search filter in the remote store's condition syntax
 */
export interface SearchFilter {
  conjunction: 'and' | 'or';
  conditions: Array<{
    field_name: string;
    operator: 'is' | 'isNot' | 'contains' | 'doesNotContain' | 'isEmpty' | 'isNotEmpty';
    value?: string[];
  }>;
}

export interface BitableClientOptions {
  appId: string;
  appSecret: string;
  /** API root (default: Feishu open platform) */
  baseUrl?: string;
  /** HTTP transport; a fresh axios instance when omitted */
  http?: AxiosInstance;
  logger?: Logger;
}

interface ApiEnvelope {
  code: number;
  msg: string;
  data: Record<string, unknown>;
}

interface HttpReply {
  status: number;
  body: unknown;
}

type FailureFactory = (failure: RemoteFailure, cause: unknown) => Error;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the {code, msg, data} envelope; null when the body is not one
 */
function readEnvelope(body: unknown): ApiEnvelope | null {
  if (!isRecord(body) || typeof body.code !== 'number') {
    return null;
  }
  return {
    code: body.code,
    msg: typeof body.msg === 'string' ? body.msg : '',
    data: isRecord(body.data) ? body.data : {},
  };
}

function describeReply(endpoint: string, reply: HttpReply, envelope: ApiEnvelope | null): RemoteFailure {
  return {
    endpoint,
    status: reply.status,
    code: envelope?.code,
    remoteMessage: envelope ? envelope.msg || undefined : 'response is not a JSON envelope',
  };
}

function isSuccess(reply: HttpReply, envelope: ApiEnvelope | null): envelope is ApiEnvelope {
  return reply.status === 200 && envelope !== null && envelope.code === SUCCESS_CODE;
}

/**
 * Client for the Bitable (multi-dimensional table) API.
 *
 * Holds one tenant access token, acquired on first use and kept for the lifetime
 * of the instance. Requests are issued one at a time; nothing is retried.
 */
export class BitableClient {
  private readonly appId: string;
  private readonly appSecret: string;
  private readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly logger?: Logger;
  private token: Promise<string> | null = null;

  constructor(options: BitableClientOptions) {
    this.appId = options.appId;
    this.appSecret = options.appSecret;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.http = options.http ?? axios.create();
    this.logger = options.logger;
  }

  /**
   * Returns the tenant access token, exchanging the app credentials on first call.
   * Concurrent first calls share one exchange; a failed exchange is not cached.
   *
   * @throws AuthError if the exchange is rejected or fails in transit
   */
  getToken(): Promise<string> {
    if (!this.token) {
      this.token = this.acquireToken().catch((error: unknown) => {
        this.token = null;
        throw error;
      });
    }
    return this.token;
  }

  /**
   * Lists the sheets of a spreadsheet in the order the API returns them
   *
   * @throws SheetResolutionError
   */
  async listSheets(appToken: string): Promise<SheetInfo[]> {
    const endpoint = `/bitable/v1/spreadsheets/${encodeURIComponent(appToken)}`;
    const token = await this.getToken();
    const reply = await this.send('GET', endpoint, undefined, token, (failure, cause) => {
      return new SheetResolutionError(appToken, failure, { cause });
    });

    const envelope = readEnvelope(reply.body);
    if (!isSuccess(reply, envelope)) {
      throw new SheetResolutionError(appToken, describeReply(endpoint, reply, envelope));
    }

    const spreadsheet = envelope.data.spreadsheet;
    const sheets = isRecord(spreadsheet) && Array.isArray(spreadsheet.sheets) ? spreadsheet.sheets : [];
    const result: SheetInfo[] = [];
    for (const sheet of sheets) {
      if (!isRecord(sheet) || typeof sheet.sheet_id !== 'string' || sheet.sheet_id === '') continue;
      result.push({
        sheet_id: sheet.sheet_id,
        title: typeof sheet.title === 'string' ? sheet.title : undefined,
        index: typeof sheet.index === 'number' ? sheet.index : undefined,
      });
    }
    return result;
  }

  /**
   * Resolves the first sheet of a spreadsheet
   *
   * @throws SheetResolutionError if the lookup fails or the spreadsheet has no sheets
   */
  async resolveDefaultTable(appToken: string): Promise<string> {
    const sheets = await this.listSheets(appToken);
    if (sheets.length === 0) {
      throw new SheetResolutionError(
        appToken,
        {
          endpoint: `/bitable/v1/spreadsheets/${encodeURIComponent(appToken)}`,
          remoteMessage: 'spreadsheet has no sheets',
        },
        { hint: 'Pass a table id explicitly or add a sheet to the spreadsheet' }
      );
    }
    this.logger?.debug(`Resolved default sheet of ${appToken}: ${sheets[0].sheet_id}`);
    return sheets[0].sheet_id;
  }

  /**
   * Fetches every record of a table matching the filter, following page tokens.
   * Pages are requested sequentially and concatenated in the order received.
   *
   * @param tableId - Table to search; the first sheet when omitted
   * @throws RecordFetchError if any page fails; nothing is returned in that case
   */
  async searchRecords(
    appToken: string,
    tableId?: string,
    filter?: SearchFilter,
    pageSize: number = DEFAULT_PAGE_SIZE
  ): Promise<RemoteRecord[]> {
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
    }

    const table = tableId || (await this.resolveDefaultTable(appToken));
    const endpoint = `/bitable/v1/apps/${encodeURIComponent(appToken)}/tables/${encodeURIComponent(table)}/records/search`;
    const token = await this.getToken();

    const records: RemoteRecord[] = [];
    let pageToken = '';

    for (let page = 1; ; page++) {
      const body: Record<string, unknown> = { page_size: pageSize, page_token: pageToken };
      if (filter) body.filter = filter;

      const reply = await this.send('POST', endpoint, body, token, (failure, cause) => {
        return new RecordFetchError(appToken, table, page, failure, { cause });
      });

      const envelope = readEnvelope(reply.body);
      if (!isSuccess(reply, envelope)) {
        throw new RecordFetchError(appToken, table, page, describeReply(endpoint, reply, envelope));
      }

      const items = Array.isArray(envelope.data.items) ? envelope.data.items : [];
      for (const item of items) {
        if (isRecord(item)) records.push(item);
      }
      this.logger?.debug(`Fetched page ${page} of ${table}: ${items.length} record(s)`);

      const next = envelope.data.page_token;
      if (typeof next !== 'string' || next === '' || envelope.data.has_more === false) {
        break;
      }
      pageToken = next;
    }

    return records;
  }

  /**
   * Inserts one record
   *
   * @returns The `data` object of the response
   * @throws InsertError unless the response is HTTP 200 with code 0
   */
  async insertOne(
    appToken: string,
    tableId: string,
    fields: Record<string, FieldValue>
  ): Promise<Record<string, unknown>> {
    const endpoint = `/bitable/v1/apps/${encodeURIComponent(appToken)}/tables/${encodeURIComponent(tableId)}/records`;
    const payload: StorePayload = { fields };
    this.logger?.debug(`POST ${endpoint} ${JSON.stringify(payload)}`);

    const token = await this.getToken();
    const reply = await this.send('POST', endpoint, payload, token, (failure, cause) => {
      return new InsertError(tableId, failure, undefined, { cause });
    });

    const envelope = readEnvelope(reply.body);
    if (!isSuccess(reply, envelope)) {
      throw new InsertError(tableId, describeReply(endpoint, reply, envelope), reply.body);
    }
    return envelope.data;
  }

  /**
   * Inserts records in one request. The endpoint is all-or-nothing; callers keep
   * `records` within the remote batch-size limit.
   *
   * @returns The `data` object of the response
   * @throws BatchInsertError unless the response is HTTP 200 with code 0
   */
  async batchInsert(
    appToken: string,
    tableId: string,
    records: StorePayload[]
  ): Promise<Record<string, unknown>> {
    const endpoint = `/bitable/v1/apps/${encodeURIComponent(appToken)}/tables/${encodeURIComponent(tableId)}/records/batch_create`;
    const payload = { records };
    this.logger?.debug(`POST ${endpoint} ${JSON.stringify(payload)}`);

    const token = await this.getToken();
    const reply = await this.send('POST', endpoint, payload, token, (failure, cause) => {
      return new BatchInsertError(tableId, records.length, failure, undefined, { cause });
    });

    const envelope = readEnvelope(reply.body);
    if (!isSuccess(reply, envelope)) {
      throw new BatchInsertError(
        tableId,
        records.length,
        describeReply(endpoint, reply, envelope),
        reply.body
      );
    }
    return envelope.data;
  }

  private async acquireToken(): Promise<string> {
    const endpoint = '/auth/v3/tenant_access_token/internal';
    const reply = await this.send(
      'POST',
      endpoint,
      { app_id: this.appId, app_secret: this.appSecret },
      undefined,
      (failure, cause) => new AuthError(failure, { cause })
    );

    const envelope = readEnvelope(reply.body);
    if (!isSuccess(reply, envelope)) {
      throw new AuthError(describeReply(endpoint, reply, envelope));
    }

    const body = isRecord(reply.body) ? reply.body : {};
    const token = body.tenant_access_token;
    if (typeof token !== 'string' || token === '') {
      throw new AuthError({
        endpoint,
        status: reply.status,
        code: envelope.code,
        remoteMessage: 'response carried no tenant_access_token',
      });
    }

    this.logger?.debug(`Obtained tenant access token for app ${this.appId}`);
    return token;
  }

  /**
   * Issues one request. Any HTTP status resolves; only transport failures throw,
   * converted by `onFailure` into the caller's error type.
   */
  private async send(
    method: 'GET' | 'POST',
    endpoint: string,
    payload: unknown,
    token: string | undefined,
    onFailure: FailureFactory
  ): Promise<HttpReply> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json; charset=utf-8',
    };
    if (token) headers.Authorization = `Bearer ${token}`;

    try {
      const response = await this.http.request<unknown>({
        method,
        url: `${this.baseUrl}${endpoint}`,
        data: payload,
        headers,
        validateStatus: () => true,
      });
      return { status: response.status, body: response.data };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw onFailure({ endpoint, remoteMessage: reason }, error);
    }
  }
}
