/**
 * Minimal HTTP client built on native fetch.
 *
 * API surface:
 *   - HttpClient.create({ baseURL, timeout, headers })
 *   - instance.get(url) / instance.post(url, body) / instance.postForm(url, params)
 *   - instance.interceptors.request.use(fn)
 *   - instance.interceptors.response.use(fn)
 *   - isHttpClientError(err) type guard
 *
 * Relative paths are resolved against baseURL; absolute URLs are used as-is,
 * since Steam spreads one login across several hosts.
 */

export interface HttpClientConfig {
  baseURL?: string;
  timeout?: number;
  headers?: Record<string, string>;
}

export interface RequestConfig {
  headers?: Record<string, string>;
}

/** Request as seen by interceptors, after defaults are merged. */
export interface OutgoingRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
}

export interface HttpResponse {
  /** Parsed JSON body, or the raw text when the body is not JSON. */
  data: unknown;
  text: string;
  status: number;
  headers: Record<string, string>;
  /** Every Set-Cookie header, unmerged. */
  setCookies: string[];
  url: string;
}

export class HttpClientError extends Error {
  public response?: {
    data: unknown;
    status: number;
    headers: Record<string, string>;
  };
  public code?: string;

  constructor(message: string, options?: {
    response?: HttpClientError['response'];
    code?: string;
  }) {
    super(message);
    this.name = 'HttpClientError';
    this.response = options?.response;
    this.code = options?.code;
  }
}

export function isHttpClientError(error: unknown): error is HttpClientError {
  return error instanceof HttpClientError;
}

export type RequestInterceptor = (request: OutgoingRequest) => OutgoingRequest | Promise<OutgoingRequest>;
export type ResponseInterceptor = (response: HttpResponse) => void;

type RequestBody =
  | { kind: 'none' }
  | { kind: 'json'; value: unknown }
  | { kind: 'form'; params: Record<string, string> };

function errorCause(err: unknown): { name?: string; message?: string; causeCode?: string } {
  if (!(err instanceof Error)) return {};
  const cause: unknown = err.cause;
  const causeCode = typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string'
    ? cause.code
    : undefined;
  return { name: err.name, message: err.message, causeCode };
}

export class HttpClient {
  private baseURL: string;
  private timeout: number;
  private defaultHeaders: Record<string, string>;

  private requestHandlers: RequestInterceptor[] = [];
  private responseHandlers: ResponseInterceptor[] = [];

  public interceptors = {
    request: {
      use: (handler: RequestInterceptor): void => {
        this.requestHandlers.push(handler);
      },
    },
    response: {
      use: (handler: ResponseInterceptor): void => {
        this.responseHandlers.push(handler);
      },
    },
  };

  private constructor(config: HttpClientConfig) {
    this.baseURL = (config.baseURL ?? '').replace(/\/$/, '');
    this.timeout = config.timeout ?? 30000;
    this.defaultHeaders = { ...config.headers };
  }

  static create(config: HttpClientConfig = {}): HttpClient {
    return new HttpClient(config);
  }

  async get(url: string, config?: RequestConfig): Promise<HttpResponse> {
    return this.request('GET', url, { kind: 'none' }, config);
  }

  /** POST with a JSON body. */
  async post(url: string, body?: unknown, config?: RequestConfig): Promise<HttpResponse> {
    return this.request('POST', url, body === undefined ? { kind: 'none' } : { kind: 'json', value: body }, config);
  }

  /** POST with an application/x-www-form-urlencoded body. */
  async postForm(url: string, params: Record<string, string>, config?: RequestConfig): Promise<HttpResponse> {
    return this.request('POST', url, { kind: 'form', params }, config);
  }

  private resolveUrl(url: string): string {
    if (/^https?:\/\//i.test(url)) return url;
    return `${this.baseURL}${url}`;
  }

  private async request(
    method: string,
    url: string,
    body: RequestBody,
    config?: RequestConfig,
  ): Promise<HttpResponse> {
    let outgoing: OutgoingRequest = {
      method,
      url: this.resolveUrl(url),
      headers: {
        ...this.defaultHeaders,
        ...(config?.headers || {}),
      },
    };

    let payload: string | undefined;
    if (body.kind === 'json') {
      payload = JSON.stringify(body.value);
      outgoing.headers['Content-Type'] = 'application/json';
    } else if (body.kind === 'form') {
      payload = new URLSearchParams(body.params).toString();
      outgoing.headers['Content-Type'] = 'application/x-www-form-urlencoded; charset=UTF-8';
    }

    for (const handler of this.requestHandlers) {
      outgoing = await handler(outgoing);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    let res: Response;
    let text: string;
    try {
      res = await fetch(outgoing.url, {
        method: outgoing.method,
        headers: outgoing.headers,
        body: payload,
        signal: controller.signal,
      });
      text = await res.text();
    } catch (err: unknown) {
      const { name, message, causeCode } = errorCause(err);
      if (name === 'AbortError') {
        throw new HttpClientError('Request timed out', { code: 'ECONNABORTED' });
      }
      throw new HttpClientError(message || 'Network error', { code: causeCode });
    } finally {
      clearTimeout(timer);
    }

    const responseHeaders: Record<string, string> = {};
    res.headers.forEach((value, key) => {
      responseHeaders[key] = value;
    });

    let data: unknown = null;
    if (text) {
      try { data = JSON.parse(text); } catch { data = text; }
    }

    const response: HttpResponse = {
      data,
      text,
      status: res.status,
      headers: responseHeaders,
      setCookies: res.headers.getSetCookie(),
      url: outgoing.url,
    };

    // Interceptors see failed responses too: Steam sets cookies on error pages
    for (const handler of this.responseHandlers) {
      handler(response);
    }

    if (!res.ok) {
      throw new HttpClientError(`Request failed with status ${res.status}`, {
        response: { data, status: res.status, headers: responseHeaders },
      });
    }

    return response;
  }
}
