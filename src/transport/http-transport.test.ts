import { describe, expect, it } from 'vitest';
import pino from 'pino';
import { z } from 'zod';

import { HttpTransport, parseRetryAfter } from './http-transport.js';
import {
  AuthError,
  NotFoundError,
  RateLimitError,
  RemoteError,
  TimeoutError,
  ValidationError,
} from '../core/errors.js';
import { FakeApi, TEST_API_PATH, TEST_SERVER, hang, json } from '../testing/fake-api.js';

const OkSchema = z.object({ ok: z.boolean() }).passthrough();

function createTransport(api: FakeApi, overrides: Partial<ConstructorParameters<typeof HttpTransport>[0]> = {}) {
  return new HttpTransport({
    baseUrl: `${TEST_SERVER}${TEST_API_PATH}`,
    timeoutMs: 1_000,
    userAgent: 'drydotai-test',
    fetch: api.fetch,
    logger: pino({ level: 'silent' }),
    ...overrides,
  });
}

/** 把日志写入内存，返回解析后的每一行 */
function captureLogger(level: string) {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino({ level }, {
    write(line: string) {
      lines.push(JSON.parse(line) as Record<string, unknown>);
    },
  });
  return { logger, lines };
}

describe('HttpTransport.request', () => {
  it('sends JSON with bearer credential and parses the response', async () => {
    const api = new FakeApi().on('POST', '/items', () => json(200, { ok: true }));
    const transport = createTransport(api);

    const result = await transport.request('POST', '/items', OkSchema, {
      body: { query: 'hello' },
      credential: 'test-token',
    });

    expect(result.ok).toBe(true);
    const [request] = api.requests;
    expect(request?.body).toEqual({ query: 'hello' });
    expect(request?.headers['authorization']).toBe('Bearer test-token');
    expect(request?.headers['user-agent']).toBe('drydotai-test');
    expect(request?.headers['content-type']).toBe('application/json');
  });

  it('omits Authorization when no credential is given', async () => {
    const api = new FakeApi().on('POST', '/register-user', () => json(200, { ok: true }));
    await createTransport(api).request('POST', '/register-user', OkSchema, { body: {} });

    expect(api.requests[0]?.headers['authorization']).toBeUndefined();
  });

  it('drops undefined query parameters', async () => {
    const api = new FakeApi().on('GET', '/item', () => json(200, { ok: true }));
    await createTransport(api).request('GET', '/item', OkSchema, {
      query: { item: 'it_1', type: undefined },
    });

    expect(api.requests[0]?.query).toEqual({ item: 'it_1' });
  });

  it.each([
    [400, ValidationError],
    [422, ValidationError],
    [401, AuthError],
    [403, AuthError],
    [404, NotFoundError],
    [409, RemoteError],
    [500, RemoteError],
    [503, RemoteError],
  ])('maps HTTP %i to %O', async (status, ErrorClass) => {
    const api = new FakeApi().on('GET', '/item', () => json(status, { error: 'boom' }));
    const error = await createTransport(api).request('GET', '/item', OkSchema).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ErrorClass);
    expect(error).toMatchObject({ status, method: 'GET', path: '/item', message: `请求失败 (${status}): boom` });
  });

  it('uses the server message field when error is absent', async () => {
    const api = new FakeApi().on('GET', '/item', () => json(404, { message: 'Space not found' }));

    await expect(createTransport(api).request('GET', '/item', OkSchema)).rejects.toMatchObject({
      name: 'NotFoundError',
      message: '请求失败 (404): Space not found',
    });
  });

  it('falls back to a default message for an empty error body', async () => {
    const api = new FakeApi().on('GET', '/item', () => new Response('', { status: 401 }));

    await expect(createTransport(api).request('GET', '/item', OkSchema)).rejects.toMatchObject({
      name: 'AuthError',
      message: '请求失败 (401): 未认证或凭据已失效',
    });
  });

  it('surfaces 429 as RateLimitError with the retry-after hint', async () => {
    const api = new FakeApi().on('GET', '/items', () =>
      json(429, { error: 'slow down' }, { 'Retry-After': '7', 'X-Request-ID': 'req_42' }),
    );

    await expect(createTransport(api).request('GET', '/items', OkSchema)).rejects.toMatchObject({
      name: 'RateLimitError',
      status: 429,
      retryAfterMs: 7000,
      requestId: 'req_42',
      message: '请求失败 (429): slow down',
    });
  });

  it('reads the request id from the error payload when the header is missing', async () => {
    const api = new FakeApi().on('PUT', '/items', () => json(500, { error: 'db down', requestId: 'req_body' }));

    await expect(createTransport(api).request('PUT', '/items', OkSchema)).rejects.toMatchObject({
      name: 'RemoteError',
      requestId: 'req_body',
    });
  });

  it('fails with TimeoutError when the server does not answer in time', async () => {
    const api = new FakeApi().on('GET', '/items', hang());
    const transport = createTransport(api, { timeoutMs: 20 });

    const error = await transport.request('GET', '/items', OkSchema).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ method: 'GET', path: '/items', timeoutMs: 20 });
  });

  it('retries read calls after a timeout up to readRetries', async () => {
    const api = new FakeApi()
      .on('GET', '/items', hang())
      .on('GET', '/items', () => json(200, { ok: true }));
    const transport = createTransport(api, { timeoutMs: 20, readRetries: 1 });

    const result = await transport.request('GET', '/items', OkSchema);

    expect(result.ok).toBe(true);
    expect(api.calls('GET', '/items')).toHaveLength(2);
  });

  it('never retries mutating calls', async () => {
    const api = new FakeApi().on('POST', '/items', hang());
    const transport = createTransport(api, { timeoutMs: 20, readRetries: 3 });

    await expect(transport.request('POST', '/items', OkSchema)).rejects.toBeInstanceOf(TimeoutError);
    expect(api.calls('POST', '/items')).toHaveLength(1);
  });

  it('does not retry read calls on server errors', async () => {
    const api = new FakeApi().on('GET', '/items', () => json(503, { error: 'busy' }));
    const transport = createTransport(api, { readRetries: 2 });

    await expect(transport.request('GET', '/items', OkSchema)).rejects.toBeInstanceOf(RemoteError);
    expect(api.calls('GET', '/items')).toHaveLength(1);
  });

  it('wraps network failures as RemoteError with status 0', async () => {
    const transport = createTransport(new FakeApi(), {
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });

    await expect(transport.request('GET', '/item', OkSchema)).rejects.toMatchObject({
      name: 'RemoteError',
      status: 0,
      message: '无法连接服务器: GET /item: fetch failed',
    });
  });

  it('rejects a success body that is not JSON', async () => {
    const api = new FakeApi().on('GET', '/item', () => new Response('<html>', { status: 200 }));

    await expect(createTransport(api).request('GET', '/item', OkSchema)).rejects.toMatchObject({
      name: 'RemoteError',
      status: 200,
      message: '响应解析失败: GET /item',
    });
  });

  it('rejects a success body that does not match the schema', async () => {
    const api = new FakeApi().on('GET', '/item', () => json(200, { ok: 'yes' }));

    await expect(createTransport(api).request('GET', '/item', OkSchema)).rejects.toMatchObject({
      name: 'RemoteError',
      message: '响应格式无效: GET /item: ok: Expected boolean, received string',
    });
  });

  it('treats an empty success body as an empty object', async () => {
    const api = new FakeApi().on('DELETE', '/items', () => new Response(null, { status: 204 }));
    const result = await createTransport(api).request('DELETE', '/items', z.object({}).passthrough());

    expect(result).toEqual({});
  });
});

describe('HttpTransport logging', () => {
  it('logs a confirmation line for successful calls when verbose', async () => {
    const { logger, lines } = captureLogger('info');
    const api = new FakeApi().on('GET', '/item', () => json(200, { ok: true }));

    await createTransport(api, { verbose: true, logger }).request('GET', '/item', OkSchema);

    expect(lines.map((line) => line['msg'])).toEqual(['调用成功']);
    expect(lines[0]).toMatchObject({ method: 'GET', path: '/item', status: 200 });
  });

  it('keeps successful calls quiet when not verbose', async () => {
    const { logger, lines } = captureLogger('info');
    const api = new FakeApi().on('GET', '/item', () => json(200, { ok: true }));

    await createTransport(api, { verbose: false, logger }).request('GET', '/item', OkSchema);

    expect(lines).toEqual([]);
  });

  it('always logs the message attached by the server', async () => {
    const { logger, lines } = captureLogger('info');
    const api = new FakeApi().on('POST', '/items', () => json(200, { ok: true, message: 'Created 1 item' }));

    await createTransport(api, { logger }).request('POST', '/items', OkSchema);

    expect(lines.map((line) => line['msg'])).toEqual(['Created 1 item']);
  });
});

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter('0.5')).toBe(500);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('2026-01-01T00:00:00Z');
    expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:30 GMT', now)).toBe(30_000);
  });

  it('returns undefined for missing or malformed values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
