/**
 * 配置类型定义
 */

import { z } from 'zod';

/** 默认服务器地址 */
export const DEFAULT_SERVER = 'https://dry.ai';

/** 顶层配置 Schema */
export const ConfigSchema = z.object({
  /** 服务器地址（不含 API 前缀） */
  server: z.string().url().default(DEFAULT_SERVER),
  /** CRUD API 前缀 */
  apiPath: z.string().startsWith('/').default('/api/crud-gpt'),
  /** 显式指定的凭据，优先于本地存储 */
  token: z.string().min(1).optional(),
  /** 是否为每次成功的调用输出确认日志 */
  verbose: z.boolean().default(false),
  /** 单次请求超时（毫秒） */
  timeoutMs: z.number().int().positive().default(30_000),
  /** 只读请求超时后的重试次数 */
  readRetries: z.number().int().min(0).max(5).default(0),
  /** User-Agent 请求头 */
  userAgent: z.string().default('drydotai-node/0.2.0'),
  /** 凭据持久化文件（.env 格式） */
  tokenFile: z.string().default('.env'),
  /**
   * 已存储凭据的最长有效期（毫秒）。
   * 超过后视为不存在，需要重新认证；不设置则一直有效，直到服务端返回 401。
   */
  tokenMaxAgeMs: z.number().int().positive().optional(),
  /** 日志级别 */
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

/** 配置类型（从 Schema 推断） */
export type Config = z.infer<typeof ConfigSchema>;

/** 调用方传入的配置（全部可选） */
export type ConfigInput = z.input<typeof ConfigSchema>;
