/**
 * 条目（Item）相关类型定义
 *
 * 服务端返回的所有实体（空间、类型、文件夹、普通条目）都是同一种条目快照：
 * 固定的 ID / Name / Description / URL 字段加上任意动态字段。
 */

import { z } from 'zod';

/** 创建条目时的种类 */
export type ItemKind = 'SMARTSPACE' | 'TYPE' | 'ITEM' | 'FOLDER';

/** 条目快照 Schema（保留所有动态字段） */
export const ItemSnapshotSchema = z
  .object({
    ID: z.string().min(1),
  })
  .passthrough();

/** 条目快照 */
export type ItemSnapshot = z.infer<typeof ItemSnapshotSchema>;

/** 所有响应都可能附带的提示信息 */
const MessageSchema = z.object({
  message: z.string().nullish(),
});

/** 返回条目列表的响应（创建、更新、搜索、prompt） */
export const ItemsResponseSchema = MessageSchema.extend({
  items: z.array(ItemSnapshotSchema).nullish(),
  /** 服务端分页游标，存在时表示还有更多结果 */
  nextCursor: z.string().nullish(),
}).passthrough();

export type ItemsResponse = z.infer<typeof ItemsResponseSchema>;

/** 返回单个条目的响应（按 ID 或查询获取） */
export const ItemResponseSchema = MessageSchema.extend({
  item: ItemSnapshotSchema.nullish(),
}).passthrough();

export type ItemResponse = z.infer<typeof ItemResponseSchema>;

/** 删除操作的响应 */
export const DeleteResponseSchema = MessageSchema.passthrough();

/** 报告响应 */
export const ReportResponseSchema = MessageSchema.extend({
  report: z.string().nullish(),
}).passthrough();

/** 错误响应体（字段均可能缺失） */
export const ErrorPayloadSchema = z
  .object({
    error: z.string().optional(),
    message: z.string().optional(),
    requestId: z.string().optional(),
  })
  .passthrough();

export type ErrorPayload = z.infer<typeof ErrorPayloadSchema>;

/** 字段声明的种类 */
export type FieldKind =
  | 'text'
  | 'longText'
  | 'number'
  | 'options'
  | 'reference'
  | 'datetime'
  | 'email'
  | 'boolean'
  | 'url'
  | (string & {});

/** 类型定义中的单个字段 */
export interface FieldDefinition {
  /** 字段名 */
  name: string;
  /** 字段种类 */
  kind: FieldKind;
  /** options 字段的可选值 */
  options: string[];
  /** 是否必填 */
  required: boolean;
}

/** 字段值（带标签） */
export type FieldValue =
  | { kind: 'empty' }
  | { kind: 'text'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'enum'; value: string; options: string[] }
  | { kind: 'reference'; id: string }
  | { kind: 'datetime'; value: Date; raw: string }
  | { kind: 'list'; values: FieldValue[] }
  | { kind: 'object'; value: Record<string, unknown> };

/** 空间成员角色 */
export type SpaceRole = 'admin' | 'member';

/** 空间角色分配 */
export interface RoleAssignment {
  /** 成员邮箱 */
  email: string;
  /** 角色 */
  role: SpaceRole;
}
