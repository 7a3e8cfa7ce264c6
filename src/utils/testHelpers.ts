import axios, {
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

/**
 * A request as seen by the stub transport
 */
export interface RecordedRequest {
  method: string;
  url: string;
  authorization?: string;
  body: unknown;
}

export interface StubReply {
  /** HTTP status (default: 200) */
  status?: number;
  body: unknown;
}

export type StubHandler = (request: RecordedRequest) => StubReply | Promise<StubReply>;

/**
 * Creates an axios instance whose requests never leave the process.
 *
 * Every request is recorded (with its JSON body parsed back) and answered by
 * `handler`. Throwing from the handler simulates a transport failure.
 *
 * @example
 * const { http, requests } = createStubHttp(() => ({ body: { code: 0, msg: 'ok' } }));
 */
export function createStubHttp(handler: StubHandler): {
  http: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const authorization = config.headers.get('Authorization');
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        authorization: typeof authorization === 'string' ? authorization : undefined,
        body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      };
      requests.push(request);

      const reply = await handler(request);
      return {
        data: reply.body,
        status: reply.status ?? 200,
        statusText: String(reply.status ?? 200),
        headers: {},
        config,
      };
    },
  });

  return { http, requests };
}

export const TOKEN_URL = 'https://open.feishu.cn/open-apis/auth/v3/tenant_access_token/internal';

/**
 * Successful token exchange reply
 */
export function tokenReply(token = 'test-token'): StubReply {
  return { body: { code: 0, msg: 'ok', tenant_access_token: token, expire: 7200 } };
}

// GBK code points of the CJK characters used in test fixtures
const GBK: Record<string, number[]> = {
  收: [0xca, 0xd5],
  入: [0xc8, 0xeb],
  支: [0xd6, 0xa7],
  出: [0xb3, 0xf6],
};

/**
 * Encodes fixture text as GBK. Covers ASCII and the characters above only.
 */
export function encodeGbk(text: string): Uint8Array {
  const bytes: number[] = [];
  for (const char of text) {
    const encoded = GBK[char];
    if (encoded) {
      bytes.push(...encoded);
    } else {
      bytes.push(char.charCodeAt(0));
    }
  }
  return Uint8Array.from(bytes);
}
