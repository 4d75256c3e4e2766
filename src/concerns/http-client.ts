export type BackoffStrategy = 'fixed' | 'exponential';

export interface BasicAuth {
  username: string;
  password: string;
}

export interface RetryConfig {
  maxAttempts?: number;
  delay?: number;
  backoff?: BackoffStrategy;
  jitter?: boolean;
  retryAfter?: boolean;
  retryOn?: number[];
}

export interface HttpClientOptions {
  baseUrl?: string;
  headers?: Record<string, string>;
  timeout?: number;
  retry?: RetryConfig;
  auth?: BasicAuth;
}

export interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number>;
  timeout?: number;
}

export interface HttpClient {
  request(url: string, options?: RequestOptions): Promise<Response>;
  get(url: string, options?: RequestOptions): Promise<Response>;
}

export const DEFAULT_USER_AGENT = 'cloudsigma-inventory';

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function calculateDelay(
  attempt: number,
  baseDelay: number,
  backoff: BackoffStrategy = 'exponential',
  jitter: boolean = true
): number {
  let delay = backoff === 'exponential'
    ? baseDelay * Math.pow(2, attempt)
    : baseDelay;

  if (jitter) {
    delay = delay * (0.5 + Math.random());
  }

  return Math.min(delay, 60000);
}

export function parseRetryAfter(retryAfter: string | null): number | null {
  if (!retryAfter) return null;

  const seconds = parseInt(retryAfter, 10);
  if (!isNaN(seconds)) {
    return seconds * 1000;
  }

  const date = Date.parse(retryAfter);
  if (!isNaN(date)) {
    return Math.max(0, date - Date.now());
  }

  return null;
}

/**
 * fetch() with basic auth, a per-request timeout and retries on throttling
 * and gateway errors. Any other non-2xx response is returned to the caller,
 * its body already read within the timeout.
 */
export class FetchHttpClient implements HttpClient {
  baseUrl: string;
  defaultHeaders: Record<string, string>;
  timeout: number;
  retry: Required<RetryConfig>;
  auth: BasicAuth | null;

  constructor(options: HttpClientOptions = {}) {
    this.baseUrl = options.baseUrl || '';
    this.defaultHeaders = options.headers || {};
    this.timeout = options.timeout || 30000;
    this.retry = {
      maxAttempts: options.retry?.maxAttempts ?? 3,
      delay: options.retry?.delay ?? 1000,
      backoff: options.retry?.backoff ?? 'exponential',
      jitter: options.retry?.jitter ?? true,
      retryAfter: options.retry?.retryAfter ?? true,
      retryOn: options.retry?.retryOn ?? [429, 502, 503, 504]
    };
    this.auth = options.auth || null;
  }

  private _buildHeaders(requestHeaders: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'User-Agent': DEFAULT_USER_AGENT,
      ...this.defaultHeaders,
      ...requestHeaders
    };

    if (this.auth) {
      const credentials = Buffer.from(`${this.auth.username}:${this.auth.password}`).toString('base64');
      headers['Authorization'] = `Basic ${credentials}`;
    }

    return headers;
  }

  buildUrl(url: string, query: Record<string, string | number> = {}): string {
    const fullUrl = this.baseUrl ? new URL(url, this.baseUrl) : new URL(url);
    for (const [key, value] of Object.entries(query)) {
      fullUrl.searchParams.set(key, String(value));
    }
    return fullUrl.toString();
  }

  async request(url: string, options: RequestOptions = {}): Promise<Response> {
    const fullUrl = this.buildUrl(url, options.query);
    const method = (options.method || 'GET').toUpperCase();
    const headers = this._buildHeaders(options.headers);
    const timeout = options.timeout || this.timeout;

    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= this.retry.maxAttempts; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const response = await fetch(fullUrl, {
          method,
          headers,
          signal: controller.signal
        });

        if (!response.ok && this.retry.retryOn.includes(response.status) && attempt < this.retry.maxAttempts) {
          clearTimeout(timeoutId);
          await response.body?.cancel();
          const retryAfterDelay = this.retry.retryAfter
            ? parseRetryAfter(response.headers.get('Retry-After'))
            : null;
          await sleep(retryAfterDelay ?? calculateDelay(attempt, this.retry.delay, this.retry.backoff, this.retry.jitter));
          continue;
        }

        // The body is read under the same timeout as the headers.
        const body = await response.text();
        clearTimeout(timeoutId);

        return new Response(body === '' ? null : body, {
          status: response.status,
          statusText: response.statusText,
          headers: response.headers
        });
      } catch (error) {
        clearTimeout(timeoutId);
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt < this.retry.maxAttempts) {
          await sleep(calculateDelay(attempt, this.retry.delay, this.retry.backoff, this.retry.jitter));
          continue;
        }
      }
    }

    throw lastError || new Error('Request failed after retries');
  }

  async get(url: string, options: RequestOptions = {}): Promise<Response> {
    return this.request(url, { ...options, method: 'GET' });
  }
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  return new FetchHttpClient(options);
}
