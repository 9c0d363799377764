/**
 * CRUD API
 *
 * Space / Item 共用的端点集合。负责：
 * - 在发起任何网络请求之前校验自然语言输入
 * - 附加会话凭据，收到 401 时通知会话丢弃凭据
 * - 把响应整理为条目快照
 */

import { z } from 'zod';
import type { HttpMethod, HttpTransport, QueryParams } from '../transport/http-transport.js';
import type { AuthSession } from '../auth/auth-session.js';
import {
  DeleteResponseSchema,
  ItemResponseSchema,
  ItemsResponseSchema,
  ReportResponseSchema,
  type ItemKind,
  type ItemSnapshot,
} from '../types/item.js';
import { AuthError, NotFoundError, RemoteError, ValidationError } from '../core/errors.js';

const NonBlankText = z.string().trim().min(1);

/**
 * 校验自然语言输入或标识符，空串或纯空白抛出 ValidationError
 */
export function requireText(value: string, label: string): string {
  const parsed = NonBlankText.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`${label}不能为空`);
  }
  return parsed.data;
}

/** 单条查询条件 */
export interface ItemLookup {
  /** 条目 ID */
  item?: string;
  /** 条目种类 */
  type?: ItemKind;
  /** 自然语言查询 */
  query?: string;
  /** 限定在某个空间或文件夹内 */
  folder?: string;
}

/** 一页搜索结果 */
export interface ItemPage {
  items: ItemSnapshot[];
  /** 下一页游标，没有更多结果时为 undefined */
  nextCursor?: string;
}

export class CrudApi {
  constructor(
    private readonly transport: HttpTransport,
    readonly session: AuthSession,
  ) {}

  /**
   * 创建条目（空间、类型、文件夹或普通条目），返回服务端创建的第一个条目
   */
  async createItem(kind: ItemKind, query: string, folder?: string): Promise<ItemSnapshot> {
    const text = requireText(query, '描述');
    const body: Record<string, unknown> = { type: kind, query: text, multi: 'true' };
    if (folder) {
      body['folder'] = folder;
    }

    const data = await this.call('POST', '/items', ItemsResponseSchema, { body });
    const created = data.items?.[0];
    if (!created) {
      throw new RemoteError(`服务端未返回新建的条目: ${kind}`, { status: 200, method: 'POST', path: '/items' });
    }
    return created;
  }

  /**
   * 按 ID 或查询获取单个条目，找不到时抛出 NotFoundError
   */
  async getItem(lookup: ItemLookup): Promise<ItemSnapshot> {
    const query: QueryParams = {
      item: lookup.item === undefined ? undefined : requireText(lookup.item, 'ID'),
      type: lookup.type,
      query: lookup.query === undefined ? undefined : requireText(lookup.query, '查询'),
      folder: lookup.folder,
    };

    const data = await this.call('GET', '/item', ItemResponseSchema, { query });
    if (!data.item) {
      const target = lookup.item ?? lookup.query ?? '';
      throw new NotFoundError(`未找到${lookup.type ? ` ${lookup.type}` : '条目'}: ${target}`, {
        status: 404,
        method: 'GET',
        path: '/item',
      });
    }
    return data.item;
  }

  /**
   * 在空间或文件夹内搜索
   */
  async listItems(folder: string, query: string, cursor?: string): Promise<ItemPage> {
    const text = requireText(query, '查询');
    const data = await this.call('GET', '/items', ItemsResponseSchema, {
      query: { folder, query: text, multi: 'true', cursor },
    });
    return {
      items: data.items ?? [],
      nextCursor: data.nextCursor ?? undefined,
    };
  }

  /**
   * 用自然语言更新单个条目，返回更新后的快照
   */
  async updateItem(id: string, query: string): Promise<ItemSnapshot> {
    const text = requireText(query, '更新指令');
    const data = await this.call('PUT', '/items', ItemsResponseSchema, { body: { item: id, query: text } });
    const updated = data.items?.[0];
    if (!updated) {
      throw new RemoteError(`服务端未返回更新后的条目: ${id}`, { status: 200, method: 'PUT', path: '/items' });
    }
    return updated;
  }

  /**
   * 用自然语言批量更新空间内的条目
   */
  async updateItems(folder: string, query: string): Promise<ItemSnapshot[]> {
    const text = requireText(query, '更新指令');
    const data = await this.call('PUT', '/items', ItemsResponseSchema, { body: { folder, query: text } });
    return data.items ?? [];
  }

  /** 删除单个条目 */
  async deleteItem(id: string): Promise<void> {
    await this.call('DELETE', '/items', DeleteResponseSchema, { query: { item: id } });
  }

  /** 删除空间内匹配查询的条目 */
  async deleteItems(folder: string, query: string): Promise<void> {
    const text = requireText(query, '删除条件');
    await this.call('DELETE', '/items', DeleteResponseSchema, { query: { folder, query: text } });
  }

  /**
   * 让服务端按自然语言指令处理，返回由此新建或修改的条目
   */
  async prompt(folder: string, query: string): Promise<ItemSnapshot[]> {
    const text = requireText(query, '指令');
    const data = await this.call('POST', '/prompt', ItemsResponseSchema, { body: { folder, query: text } });
    return data.items ?? [];
  }

  /**
   * 生成文本报告
   */
  async report(folder: string, query: string): Promise<string> {
    const text = requireText(query, '报告要求');
    const data = await this.call('POST', '/report', ReportResponseSchema, { body: { folder, query: text } });
    if (typeof data.report !== 'string') {
      throw new RemoteError('服务端未返回报告内容', { status: 200, method: 'POST', path: '/report' });
    }
    return data.report;
  }

  private async call<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { query?: QueryParams; body?: Record<string, unknown> },
  ): Promise<T> {
    const credential = await this.session.ensureCredential();
    try {
      return await this.transport.request(method, path, schema, { ...options, credential: credential.token });
    } catch (err) {
      if (err instanceof AuthError && err.status === 401) {
        await this.session.invalidate(credential.token);
      }
      throw err;
    }
  }
}
