import { logger } from '@flexreport/shared';

export type QueryParamValue = string | number | boolean | null | undefined;
export type QueryParams = Record<string, QueryParamValue>;

export type HttpRequestErrorKind = 'http' | 'network' | 'timeout' | 'invalid-json';

interface HttpRequestErrorOptions {
  status?: number;
  statusText?: string;
  body?: unknown;
  cause?: unknown;
}

export class HttpRequestError extends Error {
  readonly kind: HttpRequestErrorKind;
  readonly status?: number;
  readonly statusText?: string;
  readonly body?: unknown;

  constructor(message: string, kind: HttpRequestErrorKind, options: HttpRequestErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'HttpRequestError';
    this.kind = kind;
    this.status = options.status;
    this.statusText = options.statusText;
    this.body = options.body;
  }
}

export interface JsonRequestOptions extends RequestInit {
  baseUrl?: string;
  query?: QueryParams;
  timeoutMs?: number;
}

const log = logger.child({ component: 'http-client' });

function isAbsoluteUrl(path: string): boolean {
  return /^[a-zA-Z][a-zA-Z\d+\-.]*:/.test(path);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function buildQueryString(params: QueryParams): string {
  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      searchParams.set(key, String(value));
    }
  }
  return searchParams.toString();
}

export function buildUrl(path: string, params?: QueryParams, baseUrl?: string): string {
  const query = params ? buildQueryString(params) : '';

  if (baseUrl || isAbsoluteUrl(path)) {
    const url = baseUrl ? new URL(path, baseUrl) : new URL(path);
    if (query) {
      for (const [key, value] of new URLSearchParams(query)) {
        url.searchParams.set(key, value);
      }
    }
    return url.toString();
  }

  if (!query) {
    return path;
  }

  const delimiter = path.includes('?') ? '&' : '?';
  return `${path}${delimiter}${query}`;
}

/**
 * Strip the query string so API keys and pre-signed signatures never reach the logs
 */
export function redactUrl(url: string): string {
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : `${url.slice(0, queryStart)}?[redacted]`;
}

export function extractErrorMessage(body: unknown): string | undefined {
  if (isRecord(body)) {
    for (const field of ['message', 'error', 'detail']) {
      const candidate = body[field];
      if (typeof candidate === 'string' && candidate.trim().length > 0) {
        return candidate;
      }
    }
  }

  if (typeof body === 'string' && body.trim().length > 0) {
    return body;
  }

  return undefined;
}

export interface TimeoutSignal {
  signal?: AbortSignal;
  cleanup: () => void;
  didTimeout: () => boolean;
}

/**
 * Combine an optional caller signal with a timeout
 */
export function createTimeoutSignal(inputSignal: AbortSignal | null | undefined, timeoutMs?: number): TimeoutSignal {
  if (!timeoutMs || timeoutMs <= 0) {
    return { signal: inputSignal ?? undefined, cleanup: () => {}, didTimeout: () => false };
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onAbort = () => controller.abort();
  if (inputSignal) {
    if (inputSignal.aborted) {
      controller.abort();
    } else {
      inputSignal.addEventListener('abort', onAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      clearTimeout(timeoutId);
      if (inputSignal) {
        inputSignal.removeEventListener('abort', onAbort);
      }
    },
    didTimeout: () => timedOut,
  };
}

async function throwHttpError(response: Response): Promise<never> {
  let errorBody: unknown;
  const rawResponse = response.clone();
  try {
    errorBody = await response.json();
  } catch (parseError) {
    log.debug('Received non-JSON error response body', {
      status: response.status,
      parseError: parseError instanceof Error ? parseError.message : String(parseError),
    });
    try {
      const textBody = await rawResponse.text();
      errorBody = textBody.trim().length > 0 ? textBody : undefined;
    } catch (textError) {
      log.debug('Failed to read error response body', {
        status: response.status,
        textError: textError instanceof Error ? textError.message : String(textError),
      });
    }
  }

  const message = extractErrorMessage(errorBody) || response.statusText || `HTTP ${response.status}`;
  throw new HttpRequestError(message, 'http', {
    status: response.status,
    statusText: response.statusText,
    body: errorBody,
  });
}

async function parseJsonResponse(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch (cause) {
    throw new HttpRequestError('Invalid JSON response', 'invalid-json', {
      status: response.status,
      statusText: response.statusText,
      cause,
    });
  }
}

export function toTransportError(error: unknown, timeout: TimeoutSignal, timeoutMs?: number): HttpRequestError {
  if (error instanceof HttpRequestError) {
    return error;
  }

  if (error instanceof Error && error.name === 'AbortError' && timeout.didTimeout()) {
    return new HttpRequestError(`Request timed out after ${timeoutMs}ms`, 'timeout', { cause: error });
  }

  const message = error instanceof Error ? error.message : 'Network request failed';
  return new HttpRequestError(message, 'network', { cause: error });
}

/**
 * Perform a request and return the parsed JSON body without assuming its shape.
 * Callers validate the payload before trusting it.
 */
export async function requestJson(path: string, options: JsonRequestOptions = {}): Promise<unknown> {
  const { baseUrl, query, timeoutMs, ...requestInit } = options;
  const url = buildUrl(path, query, baseUrl);
  const timeout = createTimeoutSignal(requestInit.signal, timeoutMs);
  const init = timeout.signal ? { ...requestInit, signal: timeout.signal } : requestInit;
  const startedAt = Date.now();

  try {
    const response = await fetch(url, init);

    if (!response.ok) {
      await throwHttpError(response);
    }

    return await parseJsonResponse(response);
  } catch (error) {
    throw toTransportError(error, timeout, timeoutMs);
  } finally {
    timeout.cleanup();
    log.debug(`${init.method ?? 'GET'} ${redactUrl(url)}`, { durationMs: Date.now() - startedAt });
  }
}
