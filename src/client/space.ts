/**
 * 空间句柄
 *
 * Space 绑定到一个远程工作区。所有自然语言方法把输入和空间 ID 一起发给对应端点，
 * 并把结果反序列化为 ItemType / Item / Folder / SearchResults / 报告文本。
 * 客户端不解释自然语言，只负责传递。
 */

import type { ItemSnapshot, RoleAssignment, SpaceRole } from '../types/item.js';
import { Folder, Item, ItemType, type SearchOptions } from './item.js';
import { SearchResults } from './search-results.js';

/** 角色字段名 → 角色 */
const ROLE_FIELDS: Array<[string, SpaceRole]> = [
  ['Admins', 'admin'],
  ['Members', 'member'],
];

function toEmails(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string' && v.includes('@')).map((v) => v.trim());
  }
  if (typeof value === 'string') {
    return value.split(/[,;\s]+/).filter((v) => v.includes('@'));
  }
  return [];
}

export class Space extends Item {
  protected override readonly label: string = 'Space';

  /** 网站子域名 */
  get subdomain(): string | undefined {
    const value = this.get('Subdomain');
    return typeof value === 'string' && value ? value : undefined;
  }

  /**
   * 空间的角色分配（来自快照中的 Admins / Members 字段）
   *
   * 同一邮箱同时出现在两处时只保留 admin。
   */
  get roles(): RoleAssignment[] {
    const assignments: RoleAssignment[] = [];
    const seen = new Set<string>();
    for (const [field, role] of ROLE_FIELDS) {
      for (const email of toEmails(this.get(field))) {
        const key = email.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        assignments.push({ email, role });
      }
    }
    return assignments;
  }

  /** 新建类型定义 */
  async addType(query: string): Promise<ItemType> {
    this.assertAlive();
    return new ItemType(await this.api.createItem('TYPE', query, this.id), this.api);
  }

  /** 新建条目，服务端推断其类型和字段 */
  async addItem(query: string): Promise<Item> {
    this.assertAlive();
    return this.wrap(await this.api.createItem('ITEM', query, this.id));
  }

  /** 新建文件夹 */
  async addFolder(query: string): Promise<Folder> {
    this.assertAlive();
    return new Folder(await this.api.createItem('FOLDER', query, this.id), this.api);
  }

  /** 按自然语言查找类型定义，找不到时抛出 NotFoundError */
  async getType(query: string): Promise<ItemType> {
    this.assertAlive();
    return new ItemType(await this.api.getItem({ type: 'TYPE', query, folder: this.id }), this.api);
  }

  /** 按自然语言查找文件夹，找不到时抛出 NotFoundError */
  async getFolder(query: string): Promise<Folder> {
    this.assertAlive();
    return new Folder(await this.api.getItem({ type: 'FOLDER', query, folder: this.id }), this.api);
  }

  /** 按 ID 获取空间内的条目 */
  async getItem(id: string): Promise<Item> {
    this.assertAlive();
    return this.wrap(await this.api.getItem({ item: id, folder: this.id }));
  }

  /**
   * 自然语言搜索
   *
   * 只发起一次请求；服务端分页时用 results.continuation 请求下一页。
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResults> {
    this.assertAlive();
    const page = await this.api.listItems(this.id, query, options.continuation);
    return new SearchResults(page.items, (snapshot) => this.wrap(snapshot), page.nextCursor);
  }

  /**
   * 让服务端按指令处理输入（例如从一封邮件中提取收据），
   * 返回由此新建或修改的条目，可能为空
   */
  async prompt(query: string): Promise<Item[]> {
    this.assertAlive();
    const snapshots = await this.api.prompt(this.id, query);
    return snapshots.map((snapshot) => this.wrap(snapshot));
  }

  /** 生成文本报告 */
  async report(query: string): Promise<string> {
    this.assertAlive();
    return this.api.report(this.id, query);
  }

  /** 批量更新空间内的条目，返回更新后的条目 */
  async updateItems(query: string): Promise<Item[]> {
    this.assertAlive();
    const snapshots = await this.api.updateItems(this.id, query);
    return snapshots.map((snapshot) => this.wrap(snapshot));
  }

  /** 删除空间内匹配条件的条目 */
  async deleteItems(query: string): Promise<void> {
    this.assertAlive();
    await this.api.deleteItems(this.id, query);
  }

  private wrap(snapshot: ItemSnapshot): Item {
    return new Item(snapshot, this.api);
  }
}
