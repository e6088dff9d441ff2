import { FreshgateRequest, FreshgateResponse, Transport } from '../types/index.js';
import { HttpResponse } from '../core/response.js';
import { AbortError, NetworkError, TimeoutError } from '../core/errors.js';

function causeCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || typeof error.cause !== 'object' || error.cause === null) return undefined;
  return 'code' in error.cause && typeof error.cause.code === 'string' ? error.cause.code : undefined;
}

/**
 * Origin transport over the runtime's global `fetch`.
 * Useful where undici's own pooling is not wanted, or to plug in a fetch
 * replacement in tests.
 */
export class FetchTransport implements Transport {
  async dispatch(req: FreshgateRequest): Promise<FreshgateResponse> {
    const signals: AbortSignal[] = [];
    if (req.signal) signals.push(req.signal);
    if (req.timeout !== undefined) signals.push(AbortSignal.timeout(req.timeout));

    const requestInit: RequestInit = {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: signals.length > 0 ? AbortSignal.any(signals) : undefined,
    };

    try {
      const response = await globalThis.fetch(req.url, requestInit);
      return new HttpResponse(response);
    } catch (error) {
      if (error instanceof DOMException && error.name === 'TimeoutError') {
        throw new TimeoutError(req, { phase: 'request', timeout: req.timeout });
      }
      if (error instanceof DOMException && error.name === 'AbortError') {
        throw new AbortError(error.message, req);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(message, causeCode(error), req);
    }
  }
}
