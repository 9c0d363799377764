/**
 * 认证会话
 *
 * 无密码认证流程：
 * 1. authenticate(email)：注册或登录，服务端向邮箱发送验证码
 * 2. submitCode(challenge, code)：用验证码换取长期凭据，并持久化
 *
 * 凭据在内存中缓存；已有有效凭据时不产生任何网络请求。
 * 需要刷新时，同一时间只允许一次认证流程，其它调用方等待它的结果。
 */

import { z } from 'zod';
import type { HttpTransport } from '../transport/http-transport.js';
import { TOKEN_KEY, type TokenStore } from './token-store.js';
import {
  RegisterResponseSchema,
  VerifyResponseSchema,
  type CodeProvider,
  type Credential,
  type PendingChallenge,
  type VerifyResponse,
} from '../types/auth.js';
import { AuthError, NotFoundError, ValidationError } from '../core/errors.js';
import { Semaphore } from '../core/semaphore.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('AuthSession');

const EmailSchema = z.string().trim().email();
const CodeSchema = z.string().trim().min(1);

/** AuthSession 初始化选项 */
export interface AuthSessionOptions {
  /** 传输层（认证请求不携带凭据） */
  transport: HttpTransport;
  /** 凭据持久化，不提供时仅在内存中缓存 */
  store?: TokenStore;
  /** 显式凭据，优先于持久化的凭据 */
  token?: string;
  /** 已存储凭据的最长有效期（毫秒） */
  tokenMaxAgeMs?: number;
  /** 需要自动认证时使用的邮箱 */
  email?: string;
  /** 需要自动认证时索取验证码的回调 */
  codeProvider?: CodeProvider;
  /** 当前时间（测试用） */
  now?: () => number;
}

export class AuthSession {
  private readonly transport: HttpTransport;
  private readonly store?: TokenStore;
  private readonly tokenMaxAgeMs?: number;
  private readonly email?: string;
  private readonly codeProvider?: CodeProvider;
  private readonly now: () => number;

  /** 同一时间只允许一次凭据刷新 */
  private readonly refreshLock = new Semaphore(1);

  private credential: Credential | null = null;
  /** 是否已经从持久化存储加载过 */
  private loaded = false;

  constructor(options: AuthSessionOptions) {
    this.transport = options.transport;
    this.store = options.store;
    this.tokenMaxAgeMs = options.tokenMaxAgeMs;
    this.email = options.email;
    this.codeProvider = options.codeProvider;
    this.now = options.now ?? Date.now;

    if (options.token) {
      this.credential = { token: options.token };
      this.loaded = true;
    }
  }

  /**
   * 注册或登录，服务端会向邮箱发送验证码
   */
  async authenticate(email: string): Promise<PendingChallenge> {
    const parsedEmail = EmailSchema.safeParse(email);
    if (!parsedEmail.success) {
      throw new ValidationError(`邮箱格式无效: ${email}`);
    }

    const data = await this.transport.request('POST', '/register-user', RegisterResponseSchema, {
      body: { email: parsedEmail.data },
    });

    if (!data.success) {
      throw new AuthError(data.message || `注册/登录失败: ${parsedEmail.data}`);
    }
    if (!data.userId) {
      throw new AuthError('服务端未返回 userId');
    }

    const isExistingUser = data.isExistingUser ?? false;
    log.info(
      { email: parsedEmail.data, isExistingUser },
      isExistingUser ? '已有用户，验证码已发送到邮箱' : '新用户已创建，验证码已发送到邮箱',
    );

    return { email: parsedEmail.data, userId: data.userId, isExistingUser };
  }

  /**
   * 提交验证码，成功后缓存并持久化凭据
   *
   * 验证码无效或过期时抛出 AuthError，且不会缓存任何凭据。
   */
  async submitCode(challenge: PendingChallenge, code: string): Promise<Credential> {
    const parsedCode = CodeSchema.safeParse(code);
    if (!parsedCode.success) {
      throw new ValidationError('验证码不能为空');
    }

    let data: VerifyResponse;
    try {
      data = await this.transport.request('POST', '/verify-email', VerifyResponseSchema, {
        body: { code: parsedCode.data, userId: challenge.userId, email: challenge.email },
      });
    } catch (err) {
      if (err instanceof ValidationError || err instanceof NotFoundError) {
        throw new AuthError(
          `验证码无效或已过期: ${err.message}`,
          { status: err.status, method: err.method, path: err.path, requestId: err.requestId },
          { cause: err },
        );
      }
      throw err;
    }

    if (!data.success || !data.verified) {
      throw new AuthError(data.message || '邮箱验证失败');
    }
    if (!data.mcpToken) {
      throw new AuthError('服务端未返回凭据');
    }

    const credential = this.store
      ? await this.store.save(data.mcpToken, this.now())
      : { token: data.mcpToken, savedAt: this.now() };
    this.credential = credential;
    this.loaded = true;

    log.info(
      { email: challenge.email, userCreated: data.userCreated ?? false, path: this.store?.filePath },
      data.userCreated ? '邮箱验证成功，已创建新账户' : '邮箱验证成功，已登录',
    );
    return credential;
  }

  /**
   * 完整的认证流程：发送验证码 → 索取验证码 → 换取凭据
   */
  async login(email: string, codeProvider: CodeProvider): Promise<Credential> {
    const challenge = await this.authenticate(email);
    const code = await codeProvider(challenge);
    return this.submitCode(challenge, code);
  }

  /**
   * 返回当前有效的凭据（内存或持久化存储），不发起网络请求
   */
  async getCredential(): Promise<Credential | null> {
    if (!this.loaded && this.store) {
      const stored = await this.store.load();
      // 读取期间可能已经完成了一次认证，此时读到的内容已过时
      if (!this.loaded) {
        this.credential = stored;
        this.loaded = true;
      }
    }
    if (this.credential && !this.isFresh(this.credential)) {
      log.info('已存储的凭据已过期');
      this.credential = null;
    }
    return this.credential;
  }

  /**
   * 返回有效凭据；没有时执行认证流程
   *
   * 并发调用只会触发一次认证流程。
   * 未配置 email 和 codeProvider 时抛出 AuthError。
   */
  async ensureCredential(): Promise<Credential> {
    const cached = await this.getCredential();
    if (cached) {
      return cached;
    }

    return this.refreshLock.runExclusive(async () => {
      // 等待期间可能已由其它调用方完成认证
      const current = await this.getCredential();
      if (current) {
        return current;
      }
      if (!this.email || !this.codeProvider) {
        throw new AuthError('未找到凭据，请先运行 `drydotai login` 或设置 DRY_AI_TOKEN');
      }
      log.info({ email: this.email }, '需要认证');
      return this.login(this.email, this.codeProvider);
    });
  }

  /**
   * 服务端拒绝了某个凭据（401）后调用，丢弃该凭据
   */
  async invalidate(token: string): Promise<void> {
    if (this.credential?.token === token) {
      this.credential = null;
    }
    if (process.env[TOKEN_KEY] === token) {
      delete process.env[TOKEN_KEY];
    }
    if (this.store) {
      const stored = await this.store.load();
      if (stored?.token === token) {
        await this.store.clear();
      }
      this.loaded = false;
    }
    log.warn('凭据已被服务端拒绝，已丢弃');
  }

  /**
   * 清除内存、环境变量和持久化存储中的凭据
   */
  async logout(): Promise<void> {
    this.credential = null;
    this.loaded = true;
    delete process.env[TOKEN_KEY];
    if (this.store) {
      await this.store.clear();
    }
  }

  /** 是否有有效凭据 */
  async isAuthenticated(): Promise<boolean> {
    return (await this.getCredential()) !== null;
  }

  private isFresh(credential: Credential): boolean {
    if (this.tokenMaxAgeMs === undefined || credential.savedAt === undefined) {
      return true;
    }
    return this.now() - credential.savedAt < this.tokenMaxAgeMs;
  }
}
