import { request as undiciRequest, errors as undiciErrors, Dispatcher } from 'undici';
import { STATUS_CODES } from 'node:http';
import { FreshgateRequest, FreshgateResponse, Transport } from '../types/index.js';
import { HttpResponse } from '../core/response.js';
import { AbortError, NetworkError, TimeoutError } from '../core/errors.js';

// Status codes whose responses never carry a body
const NULL_BODY_STATUSES: ReadonlySet<number> = new Set([101, 103, 204, 205, 304]);

export interface UndiciTransportOptions {
  /**
   * Custom dispatcher (Agent, Pool, ProxyAgent, MockAgent)
   * @default undici's global dispatcher
   */
  dispatcher?: Dispatcher;

  /**
   * Time to wait for response headers, in ms.
   * A request's own `timeout` takes priority.
   */
  headersTimeout?: number;

  /**
   * Time allowed between body chunks, in ms.
   * A request's own `timeout` takes priority.
   */
  bodyTimeout?: number;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return errorCode(error.cause);
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Undici request body. Anything a fetch `Request` accepts is buffered first.
 */
async function toUndiciBody(body: BodyInit | null): Promise<string | Uint8Array | null> {
  if (body === null) return null;
  if (typeof body === 'string') return body;
  return new Uint8Array(await new Response(body).arrayBuffer());
}

function toHeaders(raw: Record<string, string | string[] | undefined>): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.append(name, value);
    }
  }
  return headers;
}

/**
 * Origin transport on top of undici's `request`.
 * The response body is read in full, so cached and uncached responses behave
 * the same for callers.
 */
export class UndiciTransport implements Transport {
  constructor(private readonly options: UndiciTransportOptions = {}) {}

  async dispatch(req: FreshgateRequest): Promise<FreshgateResponse> {
    const headers: Record<string, string> = {};
    req.headers.forEach((value, name) => {
      headers[name] = value;
    });

    const headersTimeout = req.timeout ?? this.options.headersTimeout;
    const bodyTimeout = req.timeout ?? this.options.bodyTimeout;

    try {
      const { statusCode, headers: responseHeaders, body } = await undiciRequest(req.url, {
        method: req.method,
        headers,
        body: await toUndiciBody(req.body),
        signal: req.signal,
        dispatcher: this.options.dispatcher,
        headersTimeout,
        bodyTimeout,
      });

      const payload = await body.arrayBuffer();
      const response = new Response(NULL_BODY_STATUSES.has(statusCode) ? null : payload, {
        status: statusCode,
        statusText: STATUS_CODES[statusCode] ?? '',
        headers: toHeaders(responseHeaders),
      });
      return new HttpResponse(response);
    } catch (error) {
      if (error instanceof undiciErrors.ConnectTimeoutError) {
        throw new TimeoutError(req, { phase: 'connect' });
      }
      if (error instanceof undiciErrors.HeadersTimeoutError || error instanceof undiciErrors.BodyTimeoutError) {
        throw new TimeoutError(req, { phase: 'response', timeout: headersTimeout });
      }
      if (error instanceof undiciErrors.RequestAbortedError || req.signal?.aborted) {
        throw new AbortError(errorMessage(error), req);
      }
      throw new NetworkError(errorMessage(error), errorCode(error), req);
    }
  }
}
