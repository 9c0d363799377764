/**
 * 错误类型定义
 *
 * 所有自定义错误都继承自 DryAIError 基类。
 * 错误信息必须包含关键上下文参数，并且可以直接展示给用户。
 */

/** 基础错误类 */
export class DryAIError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'DryAIError';
  }
}

/** HTTP 请求上下文（状态码、请求 ID 等） */
export interface HttpErrorContext {
  /** HTTP 状态码，网络不可达时为 0 */
  status: number;
  /** HTTP 方法 */
  method?: string;
  /** 请求路径（不含服务器地址） */
  path?: string;
  /** 服务端返回的请求 ID */
  requestId?: string;
}

/**
 * 远程调用相关错误的公共基类
 */
export abstract class HttpError extends DryAIError {
  readonly status: number;
  readonly method?: string;
  readonly path?: string;
  readonly requestId?: string;

  protected constructor(
    message: string,
    code: string,
    http: HttpErrorContext,
    options?: ErrorOptions,
  ) {
    super(message, code, { ...http }, options);
    this.status = http.status;
    this.method = http.method;
    this.path = http.path;
    this.requestId = http.requestId;
  }
}

/** 配置错误 */
export class ConfigError extends DryAIError {
  constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', context, options);
    this.name = 'ConfigError';
  }
}

/** 输入无效（空文本、请求格式错误、400/422） */
export class ValidationError extends HttpError {
  constructor(message: string, http: HttpErrorContext = { status: 0 }, options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', http, options);
    this.name = 'ValidationError';
  }
}

/** 凭据缺失、过期或无效（401/403） */
export class AuthError extends HttpError {
  constructor(message: string, http: HttpErrorContext = { status: 0 }, options?: ErrorOptions) {
    super(message, 'AUTH_ERROR', http, options);
    this.name = 'AuthError';
  }
}

/** 引用的空间、条目、类型或文件夹不存在 */
export class NotFoundError extends HttpError {
  constructor(message: string, http: HttpErrorContext = { status: 404 }, options?: ErrorOptions) {
    super(message, 'NOT_FOUND', http, options);
    this.name = 'NotFoundError';
  }
}

/** 服务端限流（429） */
export class RateLimitError extends HttpError {
  constructor(
    message: string,
    http: HttpErrorContext,
    /** 服务端建议的重试等待时间（毫秒），未提供时为 undefined */
    public readonly retryAfterMs?: number,
    options?: ErrorOptions,
  ) {
    super(message, 'RATE_LIMITED', http, options);
    this.name = 'RateLimitError';
  }
}

/** 服务端失败（5xx）或网络不可达，可能是暂时性的 */
export class RemoteError extends HttpError {
  constructor(message: string, http: HttpErrorContext, options?: ErrorOptions) {
    super(message, 'REMOTE_ERROR', http, options);
    this.name = 'RemoteError';
  }
}

/** 请求超过配置的超时时间 */
export class TimeoutError extends DryAIError {
  constructor(
    public readonly method: string,
    public readonly path: string,
    public readonly timeoutMs: number,
    options?: ErrorOptions,
  ) {
    super(
      `请求超时: ${method} ${path}（${timeoutMs}ms）`,
      'TIMEOUT',
      { method, path, timeoutMs },
      options,
    );
    this.name = 'TimeoutError';
  }
}

/** 在已删除的句柄上调用操作 */
export class InvalidStateError extends DryAIError {
  constructor(kind: string, id: string) {
    super(
      `${kind} 已删除，无法继续操作: ${id}`,
      'INVALID_STATE',
      { kind, id },
    );
    this.name = 'InvalidStateError';
  }
}
