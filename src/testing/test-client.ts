/**
 * 测试用客户端工厂：连接到 FakeApi，凭据写入临时目录
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';
import { parseConfig } from '../config/config-manager.js';
import { createClientFromConfig, type ClientDependencies, type SpaceClient } from '../client/space-client.js';
import { FakeApi, TEST_API_PATH, TEST_SERVER } from './fake-api.js';

export interface TestClient {
  api: FakeApi;
  client: SpaceClient;
  tokenFile: string;
  /** 删除临时目录 */
  cleanup: () => Promise<void>;
}

export async function createTestClient(
  options: { token?: string; api?: FakeApi; deps?: ClientDependencies } = {},
): Promise<TestClient> {
  const dir = await mkdtemp(join(tmpdir(), 'drydotai-client-'));
  const tokenFile = join(dir, '.env');
  const api = options.api ?? new FakeApi();
  const config = parseConfig({
    server: TEST_SERVER,
    apiPath: TEST_API_PATH,
    token: options.token,
    tokenFile,
    timeoutMs: 1_000,
  });
  const client = createClientFromConfig(config, {
    fetch: api.fetch,
    logger: pino({ level: 'silent' }),
    ...options.deps,
  });
  return {
    api,
    client,
    tokenFile,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
