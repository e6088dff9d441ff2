import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import {
  UndiciTransport,
  HttpRequest,
  NetworkError,
  AbortError,
  withCache,
  MemoryStorage,
  formatHttpDate,
  isCacheHit,
} from '../../src/index.js';
import { fixedClock } from '../../src/testing/index.js';

const ORIGIN = 'https://api.example.com';

describe('UndiciTransport', () => {
  let agent: MockAgent;
  let transport: UndiciTransport;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    transport = new UndiciTransport({ dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should return the origin response', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/users', method: 'GET' })
      .reply(200, '[{"id":1}]', { headers: { 'content-type': 'application/json', etag: '"u1"' } });

    const response = await transport.dispatch(new HttpRequest(`${ORIGIN}/users`));

    expect(response.status).toBe(200);
    expect(response.statusText).toBe('OK');
    expect(response.headers.get('etag')).toBe('"u1"');
    expect(await response.json()).toEqual([{ id: 1 }]);
  });

  it('should forward method, headers and body', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: '/users',
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"name":"test"}',
      })
      .reply(201, '');

    const response = await transport.dispatch(
      new HttpRequest(`${ORIGIN}/users`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"name":"test"}',
      })
    );

    expect(response.status).toBe(201);
    expect(response.statusText).toBe('Created');
  });

  it('should return 304 without a body', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/users', method: 'GET', headers: { 'if-none-match': '"u1"' } })
      .reply(304, '');

    const response = await transport.dispatch(
      new HttpRequest(`${ORIGIN}/users`, { headers: { 'If-None-Match': '"u1"' } })
    );

    expect(response.status).toBe(304);
    expect(response.read()).toBeNull();
  });

  it('should wrap connection failures in NetworkError', async () => {
    agent.get(ORIGIN).intercept({ path: '/down', method: 'GET' }).replyWithError(new Error('kaboom'));

    const error = await transport.dispatch(new HttpRequest(`${ORIGIN}/down`)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.message).toBe('kaboom');
      expect(error.request?.url).toBe(`${ORIGIN}/down`);
    }
  });

  it('should report aborted requests as AbortError', async () => {
    agent.get(ORIGIN).intercept({ path: '/slow', method: 'GET' }).reply(200, 'late');

    await expect(
      transport.dispatch(new HttpRequest(`${ORIGIN}/slow`, { signal: AbortSignal.abort() }))
    ).rejects.toBeInstanceOf(AbortError);
  });

  it('should sit behind the cache', async () => {
    const now = new Date('2024-03-01T12:00:00Z');
    agent
      .get(ORIGIN)
      .intercept({ path: '/config', method: 'GET' })
      .reply(200, 'v1', { headers: { 'cache-control': 'max-age=60', date: formatHttpDate(now) } });

    const cached = withCache(transport, { storage: new MemoryStorage(), clock: fixedClock(now) });

    const first = await cached.dispatch(new HttpRequest(`${ORIGIN}/config`));
    const second = await cached.dispatch(new HttpRequest(`${ORIGIN}/config`));

    expect(isCacheHit(first)).toBe(false);
    expect(isCacheHit(second)).toBe(true);
    expect(await second.text()).toBe('v1');
  });
});
