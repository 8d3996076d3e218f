/**
 * HTTP Client - 基于 fetch 的单次请求
 *
 * 超时覆盖整个交换过程 (包括读取响应体); 不做重试
 */

export interface HttpRequestConfig {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
  url: string;
}

/** Non-2xx response. `data` holds the parsed JSON body when there is one. */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly headers: Record<string, string>;
  readonly body: string;
  readonly data: unknown;

  constructor(response: HttpResponse) {
    super(`HTTP ${response.status}: ${response.body.slice(0, 512)}`);
    this.name = 'HttpStatusError';
    this.status = response.status;
    this.headers = response.headers;
    this.body = response.body;
    this.data = parseJsonBody(response.body);
  }
}

export type AbortCause = 'timeout' | 'cancelled';

export class HttpAbortError extends Error {
  readonly abortCause: AbortCause;

  constructor(abortCause: AbortCause, message: string) {
    super(message);
    this.name = abortCause === 'timeout' ? 'TimeoutError' : 'AbortError';
    this.abortCause = abortCause;
  }
}

export class HttpClient {
  async send(config: HttpRequestConfig): Promise<HttpResponse> {
    const { signal } = config;
    if (signal?.aborted) {
      throw new HttpAbortError('cancelled', 'Request was cancelled before it was sent');
    }

    const controller = new AbortController();
    const state: { abortCause?: AbortCause } = {};
    const timeoutId = setTimeout(() => {
      state.abortCause ??= 'timeout';
      controller.abort();
    }, config.timeoutMs);
    const onCallerAbort = (): void => {
      state.abortCause ??= 'cancelled';
      controller.abort();
    };
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const fetchOptions: RequestInit = {
        method: config.method,
        headers: config.headers,
        signal: controller.signal
      };
      if (config.body !== undefined) {
        fetchOptions.body = config.body;
      }

      const response = await fetch(config.url, fetchOptions);
      const body = await response.text();
      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });
      const result: HttpResponse = {
        status: response.status,
        statusText: response.statusText,
        headers,
        body,
        url: config.url
      };
      if (!response.ok) {
        throw new HttpStatusError(result);
      }
      return result;
    } catch (error) {
      if (state.abortCause === 'timeout') {
        throw new HttpAbortError('timeout', `Request timed out after ${config.timeoutMs}ms`);
      }
      if (state.abortCause === 'cancelled') {
        throw new HttpAbortError('cancelled', 'Request was cancelled');
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

function parseJsonBody(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
