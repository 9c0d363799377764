import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';

import { Space } from './space.js';
import { createClient } from './space-client.js';
import { AuthError, NotFoundError, ValidationError } from '../core/errors.js';
import { FakeApi, json } from '../testing/fake-api.js';
import { createTestClient, type TestClient } from '../testing/test-client.js';

const SPACE = {
  ID: 'sp_1',
  Name: 'Project Management',
  Description: 'Project Management',
  URL: 'https://pm.dry.test',
};

describe('SpaceClient', () => {
  let ctx: TestClient | undefined;

  afterEach(async () => {
    await ctx?.cleanup();
    ctx = undefined;
  });

  it('creates a space from a description', async () => {
    ctx = await createTestClient({ token: 'test-token' });
    ctx.api.on('POST', '/items', () => json(200, { items: [SPACE] }));

    const space = await ctx.client.createSpace('Project Management');

    expect(space).toBeInstanceOf(Space);
    expect(space.id).toBe('sp_1');
    expect(space.description).toBe('Project Management');
    expect(space.url).toBe('https://pm.dry.test');
    const [request] = ctx.api.calls('POST', '/items');
    expect(request?.body).toEqual({ type: 'SMARTSPACE', query: 'Project Management', multi: 'true' });
    expect(request?.headers['authorization']).toBe('Bearer test-token');
  });

  it.each(['', '   ', '\n\t'])('rejects the blank description %j before any network call', async (description) => {
    ctx = await createTestClient({ token: 'test-token' });

    await expect(ctx.client.createSpace(description)).rejects.toBeInstanceOf(ValidationError);
    expect(ctx.api.requests).toHaveLength(0);
  });

  it('surfaces a server failure with its status and message', async () => {
    ctx = await createTestClient({ token: 'test-token' });
    ctx.api.on('POST', '/items', () => json(500, { error: 'Space quota exceeded' }));

    await expect(ctx.client.createSpace('Another space')).rejects.toMatchObject({
      name: 'RemoteError',
      status: 500,
      message: '请求失败 (500): Space quota exceeded',
    });
  });

  it('finds a space by natural-language query', async () => {
    ctx = await createTestClient({ token: 'test-token' });
    ctx.api.on('GET', '/item', () => json(200, { item: SPACE }));

    const space = await ctx.client.getSpace('my project space');

    expect(space.name).toBe('Project Management');
    expect(ctx.api.requests[0]?.query).toEqual({ type: 'SMARTSPACE', query: 'my project space' });
  });

  it('fails with NotFoundError when no space matches', async () => {
    ctx = await createTestClient({ token: 'test-token' });
    ctx.api.on('GET', '/item', () => json(200, { item: null }));

    const error = await ctx.client.getSpace('nothing like this').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ message: '未找到 SMARTSPACE: nothing like this' });
  });

  it('gets a space by id', async () => {
    ctx = await createTestClient({ token: 'test-token' });
    ctx.api.on('GET', '/item', () => json(200, { item: SPACE }));

    const space = await ctx.client.getSpaceById('sp_1');

    expect(space.id).toBe('sp_1');
    expect(ctx.api.requests[0]?.query).toEqual({ item: 'sp_1' });
  });

  it('fails with NotFoundError for an unknown id', async () => {
    ctx = await createTestClient({ token: 'test-token' });
    ctx.api.on('GET', '/item', () => json(404, { error: 'Item not found' }));

    await expect(ctx.client.getSpaceById('sp_missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('authenticates once for two sequential operations', async () => {
    const api = new FakeApi()
      .on('POST', '/register-user', () => json(200, { success: true, userId: 'u_1' }))
      .on('POST', '/verify-email', () => json(200, { success: true, verified: true, mcpToken: 'test-token' }))
      .on('GET', '/item', () => json(200, { item: SPACE }));
    const codeProvider = vi.fn(async () => '123456');
    ctx = await createTestClient({ api, deps: { email: 'user@example.test', codeProvider } });

    await ctx.client.getSpaceById('sp_1');
    await ctx.client.getSpace('project');

    expect(api.calls('POST', '/register-user')).toHaveLength(1);
    expect(api.calls('POST', '/verify-email')).toHaveLength(1);
    expect(api.calls('GET', '/item').map((r) => r.headers['authorization'])).toEqual([
      'Bearer test-token',
      'Bearer test-token',
    ]);
  });

  it('requires a credential when no login hooks are configured', async () => {
    ctx = await createTestClient();

    await expect(ctx.client.getSpaceById('sp_1')).rejects.toBeInstanceOf(AuthError);
    expect(ctx.api.requests).toHaveLength(0);
  });

  it('drops the stored credential after a 401', async () => {
    ctx = await createTestClient();
    await writeFile(ctx.tokenFile, 'DRY_AI_TOKEN=revoked-token\n');
    ctx.api.on('GET', '/item', () => json(401, { error: 'Token revoked' }));

    await expect(ctx.client.getSpaceById('sp_1')).rejects.toMatchObject({ name: 'AuthError', status: 401 });
    expect(await ctx.client.session.isAuthenticated()).toBe(false);
  });

  it('keeps the credential after a 403', async () => {
    ctx = await createTestClient();
    await writeFile(ctx.tokenFile, 'DRY_AI_TOKEN=member-token\n');
    ctx.api.on('GET', '/item', () => json(403, { error: 'Admins only' }));

    await expect(ctx.client.getSpaceById('sp_1')).rejects.toMatchObject({ name: 'AuthError', status: 403 });
    expect(await ctx.client.session.isAuthenticated()).toBe(true);
  });
});

describe('createClient', () => {
  const ENV_KEYS = ['DRY_AI_TOKEN', 'DRY_AI_TOKEN_SAVED_AT'];
  const previous = new Map<string, string | undefined>();
  let dir: string;
  let envFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'drydotai-env-'));
    envFile = join(dir, '.env');
    for (const key of ENV_KEYS) {
      previous.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(async () => {
    for (const key of ENV_KEYS) {
      const value = previous.get(key);
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    await rm(dir, { recursive: true, force: true });
  });

  function open(overrides: { tokenMaxAgeMs?: number } = {}) {
    return createClient({
      envFile,
      overrides: { tokenFile: envFile, ...overrides },
      fetch: new FakeApi().fetch,
      logger: pino({ level: 'silent' }),
    });
  }

  it('applies tokenMaxAgeMs to a credential stored in the .env file', async () => {
    await writeFile(envFile, 'DRY_AI_TOKEN=old-token\nDRY_AI_TOKEN_SAVED_AT=1\n');

    const client = await open({ tokenMaxAgeMs: 1_000 });

    expect(process.env['DRY_AI_TOKEN']).toBe('old-token');
    expect(await client.session.getCredential()).toBeNull();
  });

  it('treats DRY_AI_TOKEN from the real environment as an explicit token', async () => {
    process.env['DRY_AI_TOKEN'] = 'env-token';
    await writeFile(envFile, 'DRY_AI_TOKEN=old-token\nDRY_AI_TOKEN_SAVED_AT=1\n');

    const client = await open({ tokenMaxAgeMs: 1_000 });

    expect(await client.session.getCredential()).toEqual({ token: 'env-token' });
  });

  it('stays logged out for clients created after logout', async () => {
    await writeFile(envFile, 'DRY_AI_TOKEN=stored-token\n');
    const first = await open();
    expect(await first.session.isAuthenticated()).toBe(true);

    await first.session.logout();
    const second = await open();

    expect(process.env['DRY_AI_TOKEN']).toBeUndefined();
    expect(await second.session.isAuthenticated()).toBe(false);
  });
});
