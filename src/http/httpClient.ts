import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_JITTER_MS,
  DEFAULT_TIMEOUT_MS,
  IDEMPOTENT_METHODS,
  RETRY_STATUS_CODES,
  SDK_LANGUAGE,
  SDK_VERSION,
} from '../constants.js';
import {
  ConfigurationError,
  NetworkError,
  SDKError,
  TimeoutError,
  errorFromResponse,
  type ErrorBody,
} from '../errors.js';
import { jot, isPlainObject } from '../jot.js';
import { sleep } from '../utils/sleep.js';
import { toSearchParams, type QueryValue } from '../utils/hash.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number | undefined;
  maxRetries?: number | undefined;
  retryBaseDelayMs?: number | undefined;
  retryJitterMs?: number | undefined;
  fetchImpl?: FetchLike | undefined;
  logger?: ((message: string) => void) | undefined;
}

export interface RequestOptions {
  query?: Record<string, QueryValue> | undefined;
  body?: unknown;
  headers?: Record<string, string> | undefined;
  timeoutMs?: number | undefined;
  retries?: number | undefined;
  idempotencyKey?: string | undefined;
  /** Allow retrying a non-idempotent method that is known to be a read. */
  retryable?: boolean | undefined;
  /** Status codes handed back to the caller instead of being thrown. */
  acceptStatus?: readonly number[] | undefined;
}

export interface ApiResponse {
  status: number;
  headers: Headers;
  body: unknown;
  requestId: string | undefined;
}

const errorEnvelopeNode = jot.object({
  error: jot.object({
    code: jot.optional(jot.string()),
    message: jot.optional(jot.string()),
    fields: jot.optional(jot.record(jot.array(jot.string()))),
  }),
});

type Exchange =
  | { kind: 'response'; response: ApiResponse }
  | { kind: 'transport'; error: SDKError }
  | { kind: 'status'; status: number; retryAfterMs: number | undefined; error: SDKError };

export class HttpClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  private readonly apiKey: string;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryJitterMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: ((message: string) => void) | undefined;
  private readonly inFlight = new Map<string, Promise<ApiResponse>>();
  private closed = false;

  constructor(options: HttpClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = normalizedBaseUrl(options.baseUrl);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.retryJitterMs = options.retryJitterMs ?? DEFAULT_RETRY_JITTER_MS;
    this.fetchImpl = options.fetchImpl ?? globalFetch();
    this.logger = options.logger;
  }

  /**
   * Sends a request. Concurrent GETs for the same URL and headers share one round trip.
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<ApiResponse> {
    if (this.closed) {
      throw new SDKError('Client has been closed', { code: 'client_closed' });
    }

    const url = this.buildUrl(path, options.query);
    const headers = this.buildHeaders(options);

    if (method !== 'GET') {
      return this.send(method, url, headers, options);
    }

    const dedupeKey = `${url} ${JSON.stringify(Object.entries(headers).sort())}`;
    const pending = this.inFlight.get(dedupeKey);
    if (pending) {
      return pending;
    }

    const promise = this.send(method, url, headers, options).finally(() => {
      this.inFlight.delete(dedupeKey);
    });
    this.inFlight.set(dedupeKey, promise);
    return promise;
  }

  close(): void {
    this.closed = true;
    this.inFlight.clear();
  }

  private async send(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    options: RequestOptions,
  ): Promise<ApiResponse> {
    const maxRetries = options.retries ?? this.maxRetries;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const canRetry = IDEMPOTENT_METHODS.has(method) || Boolean(options.idempotencyKey) || Boolean(options.retryable);
    const init: RequestInit = {
      method,
      headers,
      body: options.body === undefined ? null : JSON.stringify(options.body),
    };

    for (let attempt = 0; ; attempt += 1) {
      const outcome = await this.exchange(method, url, init, timeoutMs, options.acceptStatus);
      if (outcome.kind === 'response') {
        return outcome.response;
      }

      if (outcome.kind === 'transport') {
        if (attempt < maxRetries && canRetry) {
          const waitMs = this.backoffDelay(attempt);
          this.logger?.(`${method} ${url} failed (${outcome.error.message}). Retrying in ${waitMs}ms.`);
          await sleep(waitMs);
          continue;
        }
        throw outcome.error;
      }

      // a Retry-After longer than the request timeout is handed to the caller instead
      const { status, retryAfterMs } = outcome;
      const waitAllowed = retryAfterMs === undefined || retryAfterMs <= timeoutMs;
      if (attempt < maxRetries && RETRY_STATUS_CODES.has(status) && (canRetry || status === 429) && waitAllowed) {
        const waitMs = retryAfterMs ?? this.backoffDelay(attempt);
        this.logger?.(`${method} ${url} returned ${status}. Retrying in ${waitMs}ms (attempt ${attempt + 1} of ${maxRetries}).`);
        await sleep(waitMs);
        continue;
      }
      throw outcome.error;
    }
  }

  /**
   * One round trip. The timeout covers the whole exchange, body included.
   */
  private async exchange(
    method: HttpMethod,
    url: string,
    init: RequestInit,
    timeoutMs: number,
    acceptStatus: readonly number[] | undefined,
  ): Promise<Exchange> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`)), timeoutMs);
    const signal = controller.signal;
    try {
      const response = await untilAborted(this.fetchImpl(url, { ...init, signal }), signal);
      const requestId = response.headers.get('x-request-id') ?? undefined;
      const accepted = acceptStatus?.includes(response.status) ?? false;

      if (response.status >= 400 && !accepted) {
        const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
        const errorBody = await readErrorBody(response, signal);
        return {
          kind: 'status',
          status: response.status,
          retryAfterMs,
          error: errorFromResponse(response.status, errorBody, requestId, retryAfterMs),
        };
      }

      return {
        kind: 'response',
        response: {
          status: response.status,
          headers: response.headers,
          body: await readBody(method, response, signal),
          requestId,
        },
      };
    } catch (error: unknown) {
      const failure = toTransportError(error, timeoutMs);
      if (failure instanceof TimeoutError || failure instanceof NetworkError) {
        return { kind: 'transport', error: failure };
      }
      throw failure;
    } finally {
      clearTimeout(timer);
    }
  }

  private backoffDelay(attempt: number): number {
    const jitter = Math.random() * this.retryJitterMs;
    return Math.round(this.retryBaseDelayMs * 2 ** attempt + jitter);
  }

  private buildUrl(path: string, query: Record<string, QueryValue> | undefined): string {
    const base = path.startsWith('http://') || path.startsWith('https://')
      ? path
      : `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
    const search = toSearchParams(query ?? {}).toString();
    return search ? `${base}?${search}` : base;
  }

  private buildHeaders(options: RequestOptions): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json',
      'User-Agent': `specstory-sdk-${SDK_LANGUAGE}/${SDK_VERSION}`,
      'X-SDK-Version': SDK_VERSION,
      'X-SDK-Language': SDK_LANGUAGE,
      ...options.headers,
    };
    if (options.idempotencyKey) {
      headers['Idempotency-Key'] = options.idempotencyKey;
    }
    return headers;
  }
}

async function readBody(method: HttpMethod, response: Response, signal: AbortSignal): Promise<unknown> {
  if (method === 'HEAD' || response.status === 204 || response.status === 304) {
    await response.body?.cancel();
    return undefined;
  }

  const text = await untilAborted(response.text(), signal);
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (error: unknown) {
    throw new SDKError(`Response from ${response.url || 'server'} is not valid JSON`, {
      status: response.status,
      code: 'invalid_response',
      cause: error,
    });
  }
}

async function readErrorBody(response: Response, signal: AbortSignal): Promise<ErrorBody | undefined> {
  let text: string;
  try {
    text = await untilAborted(response.text(), signal);
  } catch {
    return undefined;
  }
  if (!text) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { message: text.slice(0, 500) };
  }
  if (!isPlainObject(parsed)) {
    return undefined;
  }
  try {
    return errorEnvelopeNode.parse(parsed).error;
  } catch {
    return undefined;
  }
}

/**
 * Settles with `work`, or rejects with the signal's reason once it aborts. A fetch
 * implementation that ignores the signal, or a body stream that stalls, still times out.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function toTransportError(error: unknown, timeoutMs: number): SDKError {
  if (error instanceof SDKError) {
    return error;
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new TimeoutError(`Request timed out after ${timeoutMs}ms`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`Request failed: ${message}`, {
    details: { originalError: message },
    cause: error,
  });
}

function parseRetryAfter(header: string | null): number | undefined {
  if (header === null || header.trim() === '') {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

function normalizedBaseUrl(baseUrl: string): string {
  if (!baseUrl) {
    throw new ConfigurationError('baseUrl is required');
  }
  return baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
}

function globalFetch(): FetchLike {
  if (typeof fetch === 'function') {
    return fetch.bind(globalThis);
  }
  throw new ConfigurationError('fetch is not available in the current environment');
}
