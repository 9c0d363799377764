/**
 * 空间客户端
 *
 * 顶层入口：创建、按自然语言查找、按 ID 获取空间。
 * createClient() 负责加载配置并组装传输层、凭据存储和认证会话。
 */

import type pino from 'pino';
import type { Config } from '../types/config.js';
import type { CodeProvider } from '../types/auth.js';
import { HttpTransport, type FetchLike } from '../transport/http-transport.js';
import { AuthSession } from '../auth/auth-session.js';
import { TokenStore } from '../auth/token-store.js';
import { loadConfig, type LoadConfigOptions } from '../config/config-manager.js';
import { CrudApi, requireText } from './crud-api.js';
import { Space } from './space.js';

export class SpaceClient {
  constructor(readonly api: CrudApi) {}

  /** 认证会话 */
  get session(): AuthSession {
    return this.api.session;
  }

  /**
   * 用自然语言描述创建空间
   */
  async createSpace(description: string): Promise<Space> {
    requireText(description, '空间描述');
    return new Space(await this.api.createItem('SMARTSPACE', description), this.api);
  }

  /**
   * 按自然语言查找空间，找不到时抛出 NotFoundError
   *
   * 多个空间匹配时返回服务端选择的那个。
   */
  async getSpace(query: string): Promise<Space> {
    return new Space(await this.api.getItem({ type: 'SMARTSPACE', query }), this.api);
  }

  /**
   * 按 ID 获取空间，ID 不存在时抛出 NotFoundError
   */
  async getSpaceById(id: string): Promise<Space> {
    return new Space(await this.api.getItem({ item: id }), this.api);
  }
}

/** 组装客户端时可注入的依赖 */
export interface ClientDependencies {
  /** 自定义 fetch 实现 */
  fetch?: FetchLike;
  /** 自定义 logger */
  logger?: pino.Logger;
  /** 没有凭据时自动认证使用的邮箱 */
  email?: string;
  /** 自动认证时索取验证码的回调 */
  codeProvider?: CodeProvider;
  /** 当前时间（测试用） */
  now?: () => number;
}

/**
 * 用已验证的配置组装客户端
 */
export function createClientFromConfig(config: Config, deps: ClientDependencies = {}): SpaceClient {
  const transport = new HttpTransport({
    baseUrl: `${config.server.replace(/\/+$/, '')}${config.apiPath}`,
    timeoutMs: config.timeoutMs,
    readRetries: config.readRetries,
    userAgent: config.userAgent,
    verbose: config.verbose,
    fetch: deps.fetch,
    logger: deps.logger,
  });

  const session = new AuthSession({
    transport,
    store: new TokenStore(config.tokenFile),
    token: config.token,
    tokenMaxAgeMs: config.tokenMaxAgeMs,
    email: deps.email,
    codeProvider: deps.codeProvider,
    now: deps.now,
  });

  return new SpaceClient(new CrudApi(transport, session));
}

/** createClient 选项 */
export interface CreateClientOptions extends LoadConfigOptions, ClientDependencies {}

/**
 * 加载配置（配置文件、.env、环境变量、overrides）并创建客户端
 */
export async function createClient(options: CreateClientOptions = {}): Promise<SpaceClient> {
  const config = await loadConfig(options);
  return createClientFromConfig(config, options);
}
