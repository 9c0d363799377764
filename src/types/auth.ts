/**
 * 认证相关类型定义
 */

import { z } from 'zod';

/** POST /register-user 响应 */
export const RegisterResponseSchema = z
  .object({
    success: z.boolean().optional(),
    userId: z.string().nullish(),
    isExistingUser: z.boolean().optional(),
    message: z.string().nullish(),
  })
  .passthrough();

/** POST /verify-email 响应 */
export const VerifyResponseSchema = z
  .object({
    success: z.boolean().optional(),
    verified: z.boolean().optional(),
    mcpToken: z.string().nullish(),
    userCreated: z.boolean().optional(),
    message: z.string().nullish(),
  })
  .passthrough();

export type VerifyResponse = z.infer<typeof VerifyResponseSchema>;

/** 已发送验证码、等待用户输入的认证挑战 */
export interface PendingChallenge {
  /** 用户邮箱 */
  email: string;
  /** 服务端分配的用户 ID */
  userId: string;
  /** 是否为已有用户 */
  isExistingUser: boolean;
}

/** 认证成功后得到的凭据 */
export interface Credential {
  /** Bearer 令牌 */
  token: string;
  /** 保存时间（毫秒时间戳），未知时为 undefined */
  savedAt?: number;
}

/** 向用户索取验证码的回调 */
export type CodeProvider = (challenge: PendingChallenge) => Promise<string>;
