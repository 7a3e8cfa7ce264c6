/**
 * Error taxonomy for the ledger sync.
 *
 * Every error carries enough context (endpoint, identifiers, remote message) to be
 * diagnosed from the terminal output alone. `hint` is shown to the user below the
 * message when present.
 */

export interface LedgerSyncErrorOptions {
  hint?: string;
  cause?: unknown;
}

export class LedgerSyncError extends Error {
  readonly hint?: string;

  constructor(message: string, options: LedgerSyncErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'LedgerSyncError';
    this.hint = options.hint;
  }
}

/**
 * Details of a failed remote call
 */
export interface RemoteFailure {
  /** Request path relative to the API base URL */
  endpoint: string;
  /** HTTP status, absent when the request never got a response */
  status?: number;
  /** Application-level status code from the response body */
  code?: number;
  /** Remote-supplied message */
  remoteMessage?: string;
}

function describeFailure(failure: RemoteFailure): string {
  const parts: string[] = [];
  if (failure.status !== undefined) parts.push(`HTTP ${failure.status}`);
  if (failure.code !== undefined) parts.push(`code ${failure.code}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

/**
 * Base class for failures reported by (or on the way to) the remote store
 */
export class RemoteApiError extends LedgerSyncError {
  readonly endpoint: string;
  readonly status?: number;
  readonly code?: number;
  readonly remoteMessage?: string;

  constructor(summary: string, failure: RemoteFailure, options: LedgerSyncErrorOptions = {}) {
    const detail = failure.remoteMessage ? `: ${failure.remoteMessage}` : '';
    super(`${summary}${detail}${describeFailure(failure)} [${failure.endpoint}]`, options);
    this.name = 'RemoteApiError';
    this.endpoint = failure.endpoint;
    this.status = failure.status;
    this.code = failure.code;
    this.remoteMessage = failure.remoteMessage;
  }
}

export class AuthError extends RemoteApiError {
  constructor(failure: RemoteFailure, options: LedgerSyncErrorOptions = {}) {
    super('Failed to obtain tenant access token', failure, {
      hint: 'Check FEISHU_APP_ID and FEISHU_APP_SECRET',
      ...options,
    });
    this.name = 'AuthError';
  }
}

export class SheetResolutionError extends RemoteApiError {
  readonly appToken: string;

  constructor(appToken: string, failure: RemoteFailure, options: LedgerSyncErrorOptions = {}) {
    super(`Failed to resolve default sheet of app ${appToken}`, failure, options);
    this.name = 'SheetResolutionError';
    this.appToken = appToken;
  }
}

export class RecordFetchError extends RemoteApiError {
  readonly appToken: string;
  readonly tableId: string;
  readonly page: number;

  constructor(
    appToken: string,
    tableId: string,
    page: number,
    failure: RemoteFailure,
    options: LedgerSyncErrorOptions = {}
  ) {
    super(`Failed to fetch page ${page} of table ${tableId} (app ${appToken})`, failure, options);
    this.name = 'RecordFetchError';
    this.appToken = appToken;
    this.tableId = tableId;
    this.page = page;
  }
}

/**
 * A write was rejected. `body` holds the full response so partial-failure detail
 * reported by the remote store is not lost.
 */
export class InsertError extends RemoteApiError {
  readonly tableId: string;
  readonly body: unknown;

  constructor(
    tableId: string,
    failure: RemoteFailure,
    body: unknown,
    options: LedgerSyncErrorOptions = {},
    summary = `Failed to insert record into table ${tableId}`
  ) {
    super(summary, failure, options);
    this.name = 'InsertError';
    this.tableId = tableId;
    this.body = body;
  }

  /** Message plus the serialized response body */
  get detail(): string {
    if (this.body === undefined) return this.message;
    const serialized = typeof this.body === 'string' ? this.body : JSON.stringify(this.body);
    return `${this.message}\nResponse: ${serialized}`;
  }
}

export class BatchInsertError extends InsertError {
  readonly recordCount: number;

  constructor(
    tableId: string,
    recordCount: number,
    failure: RemoteFailure,
    body: unknown,
    options: LedgerSyncErrorOptions = {}
  ) {
    super(
      tableId,
      failure,
      body,
      options,
      `Failed to batch insert ${recordCount} record(s) into table ${tableId}`
    );
    this.name = 'BatchInsertError';
    this.recordCount = recordCount;
  }
}

export class ConfigError extends LedgerSyncError {
  constructor(message: string, options: LedgerSyncErrorOptions = {}) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class DecodeError extends LedgerSyncError {
  readonly attempted: string[];

  constructor(attempted: string[], options: LedgerSyncErrorOptions = {}) {
    super(`Unable to decode ledger with ${attempted.join(', ')}`, options);
    this.name = 'DecodeError';
    this.attempted = attempted;
  }
}

export class ExtractionError extends LedgerSyncError {
  constructor(message: string, options: LedgerSyncErrorOptions = {}) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

/**
 * Formats any thrown value for the terminal
 */
export function formatError(error: unknown): string {
  if (error instanceof InsertError) return error.detail;
  if (error instanceof Error) return error.message;
  return String(error);
}
