import { Method, FreshgateRequest, RequestOptions } from '../types/index.js';

export class HttpRequest implements FreshgateRequest {
  public readonly url: string;
  public readonly method: Method;
  public readonly headers: Headers;
  public readonly body: BodyInit | null;
  public readonly signal?: AbortSignal;
  public readonly timeout?: number;

  constructor(url: string, options: RequestOptions = {}) {
    this.url = url;
    this.method = options.method || 'GET';
    this.headers = new Headers(options.headers);
    this.body = options.body || null;
    this.signal = options.signal;
    this.timeout = options.timeout;
  }

  withHeader(name: string, value: string): FreshgateRequest {
    const newHeaders = new Headers(this.headers);
    newHeaders.set(name, value);
    return new HttpRequest(this.url, {
      method: this.method,
      headers: newHeaders,
      body: this.body,
      signal: this.signal,
      timeout: this.timeout,
    });
  }
}
