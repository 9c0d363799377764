/**
 * HTTP 传输层
 *
 * 把 (method, path, payload, credential) 变成一次 HTTP 请求，
 * 返回经过 Zod 校验的 JSON 结果，或者按状态码映射的类型化错误：
 *
 * - 400 / 422 → ValidationError
 * - 401 / 403 → AuthError
 * - 404       → NotFoundError
 * - 429       → RateLimitError（带 Retry-After）
 * - 其余      → RemoteError
 *
 * 这里不包含任何业务逻辑。只读请求（GET）在超时后可以按配置重试，
 * 写请求从不自动重试。
 */

import type pino from 'pino';
import type { z } from 'zod';
import { ErrorPayloadSchema } from '../types/item.js';
import {
  AuthError,
  NotFoundError,
  RateLimitError,
  RemoteError,
  TimeoutError,
  ValidationError,
  type HttpError,
  type HttpErrorContext,
} from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const defaultLog = createChildLogger('HttpTransport');

/** HTTP 方法 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** 可替换的 fetch 实现（测试用） */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** 查询参数 */
export type QueryParams = Record<string, string | undefined>;

/** 传输层初始化选项 */
export interface HttpTransportOptions {
  /** API 根地址，如 https://dry.ai/api/crud-gpt */
  baseUrl: string;
  /** 单次请求超时（毫秒） */
  timeoutMs: number;
  /** 只读请求超时后的重试次数 */
  readRetries?: number;
  /** User-Agent 请求头 */
  userAgent?: string;
  /** 成功调用是否以 info 级别输出确认日志 */
  verbose?: boolean;
  /** 自定义 fetch 实现 */
  fetch?: FetchLike;
  /** 自定义 logger */
  logger?: pino.Logger;
}

/** 单次请求选项 */
export interface RequestOptions {
  /** 查询参数，值为 undefined 的键会被忽略 */
  query?: QueryParams;
  /** JSON 请求体 */
  body?: Record<string, unknown>;
  /** Bearer 凭据 */
  credential?: string;
}

/** 各状态码在服务端未给出说明时的默认提示 */
const DEFAULT_STATUS_MESSAGES: Record<number, string> = {
  400: '请求参数无效',
  401: '未认证或凭据已失效',
  403: '没有权限执行此操作',
  404: '请求的资源不存在',
  422: '请求参数无效',
  429: '请求过于频繁，请稍后再试',
};

/** 错误响应体最多保留的字符数 */
const MAX_ERROR_TEXT = 200;

function buildUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const url = `${baseUrl}${path}`;
  if (!query) return url;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    params.set(key, value);
  }
  const qs = params.toString();
  return qs ? `${url}?${qs}` : url;
}

/**
 * 解析 Retry-After 头（秒数或 HTTP 日期），返回毫秒
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const trimmed = header.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/** 从错误响应体中提取服务端说明 */
function extractServerMessage(text: string): { message?: string; requestId?: string } {
  if (!text.trim()) return {};
  try {
    const parsed = ErrorPayloadSchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      return {
        message: parsed.data.error || parsed.data.message,
        requestId: parsed.data.requestId,
      };
    }
  } catch {
    // 非 JSON 错误体，按纯文本处理
  }
  return { message: text.trim().slice(0, MAX_ERROR_TEXT) };
}

/**
 * 按状态码构造类型化错误
 */
export function errorFromStatus(
  status: number,
  body: string,
  headers: Headers,
  http: Omit<HttpErrorContext, 'status'>,
): HttpError {
  const extracted = extractServerMessage(body);
  const context: HttpErrorContext = {
    ...http,
    status,
    requestId: http.requestId ?? extracted.requestId,
  };
  const detail = extracted.message || DEFAULT_STATUS_MESSAGES[status] || `HTTP ${status}`;
  const message = `请求失败 (${status}): ${detail}`;

  switch (status) {
    case 400:
    case 422:
      return new ValidationError(message, context);
    case 401:
    case 403:
      return new AuthError(message, context);
    case 404:
      return new NotFoundError(message, context);
    case 429:
      return new RateLimitError(message, context, parseRetryAfter(headers.get('Retry-After')));
    default:
      return new RemoteError(message, context);
  }
}

/**
 * HTTP 传输层
 */
export class HttpTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly readRetries: number;
  private readonly userAgent: string;
  private readonly verbose: boolean;
  private readonly fetchImpl: FetchLike;
  private readonly log: pino.Logger;

  constructor(options: HttpTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.readRetries = options.readRetries ?? 0;
    this.userAgent = options.userAgent ?? 'drydotai-node';
    this.verbose = options.verbose ?? false;
    // 不在构造时捕获全局 fetch，便于测试替换
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.log = options.logger ?? defaultLog;
  }

  /**
   * 发送请求并按 schema 校验响应
   *
   * 只读请求在超时后最多重试 readRetries 次，其余错误直接抛出。
   */
  async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<T> {
    const maxAttempts = method === 'GET' ? 1 + this.readRetries : 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.send(method, path, schema, options);
      } catch (err) {
        if (err instanceof TimeoutError && attempt < maxAttempts) {
          this.log.warn({ method, path, attempt, maxAttempts }, '请求超时，重试');
          continue;
        }
        throw err;
      }
    }
  }

  private async send<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions,
  ): Promise<T> {
    const url = buildUrl(this.baseUrl, path, options.query);
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      'Accept': 'application/json',
      'Content-Type': 'application/json',
    };
    if (options.credential) {
      headers['Authorization'] = `Bearer ${options.credential}`;
    }

    const startedAt = Date.now();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        this.log.warn({ method, path, timeoutMs: this.timeoutMs }, '请求超时');
        throw new TimeoutError(method, path, this.timeoutMs, { cause: err });
      }
      const reason = err instanceof Error ? err.message : String(err);
      this.log.warn({ method, path, err }, '无法连接服务器');
      throw new RemoteError(
        `无法连接服务器: ${method} ${path}: ${reason}`,
        { status: 0, method, path },
        { cause: err },
      );
    } finally {
      clearTimeout(timer);
    }

    const durationMs = Date.now() - startedAt;
    const requestId = response.headers.get('X-Request-ID') ?? undefined;

    if (!response.ok) {
      const error = errorFromStatus(response.status, text, response.headers, { method, path, requestId });
      this.log.warn({ method, path, status: response.status, requestId, durationMs }, error.message);
      throw error;
    }

    let data: unknown;
    try {
      data = text.trim() ? JSON.parse(text) : {};
    } catch (err) {
      throw new RemoteError(
        `响应解析失败: ${method} ${path}`,
        { status: response.status, method, path, requestId },
        { cause: err },
      );
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new RemoteError(
        `响应格式无效: ${method} ${path}: ${issues.join('; ')}`,
        { status: response.status, method, path, requestId },
      );
    }

    this.logServerMessage(data, path);
    if (this.verbose) {
      this.log.info({ method, path, status: response.status, durationMs }, '调用成功');
    } else {
      this.log.debug({ method, path, status: response.status, durationMs }, '调用成功');
    }

    return parsed.data;
  }

  /** 服务端附带的提示信息总是输出 */
  private logServerMessage(data: unknown, path: string): void {
    if (data === null || typeof data !== 'object' || !('message' in data)) return;
    const { message } = data;
    if (typeof message === 'string' && message) {
      this.log.info({ path }, message);
    }
  }
}
