/**
 * 条目句柄
 *
 * Item 绑定到一条远程记录，持有服务端最近一次返回的快照。
 * 所有字段都来自服务端；update() 之后句柄立即反映服务端确认的新值。
 * delete() 是终态操作，之后任何调用都会抛出 InvalidStateError，且不产生网络请求。
 */

import type { CrudApi } from './crud-api.js';
import type { FieldDefinition, FieldValue, ItemSnapshot } from '../types/item.js';
import { InvalidStateError } from '../core/errors.js';
import { findKey, parseFieldDefinitions, readField, toFieldValue } from './fields.js';
import { SearchResults } from './search-results.js';

/** toString() 中字符串值的最大显示长度 */
const MAX_DISPLAY_LENGTH = 80;

/** 搜索选项 */
export interface SearchOptions {
  /** 上一页结果的 continuation */
  continuation?: string;
}

export class Item {
  /** 用于错误信息和 toString() 的名称 */
  protected readonly label: string = 'Item';

  private snapshot: ItemSnapshot;
  private deleted = false;
  private type?: ItemType;

  constructor(snapshot: ItemSnapshot, protected readonly api: CrudApi) {
    this.snapshot = { ...snapshot };
  }

  get id(): string {
    return this.snapshot.ID;
  }

  get name(): string | undefined {
    return this.stringField('Name');
  }

  get description(): string | undefined {
    return this.stringField('Description');
  }

  get url(): string | undefined {
    return this.stringField('URL');
  }

  /** 是否已删除 */
  get isDeleted(): boolean {
    return this.deleted;
  }

  /** 读取原始字段值，字段名不区分大小写 */
  get(name: string): unknown {
    return readField(this.snapshot, name);
  }

  has(name: string): boolean {
    return findKey(this.snapshot, name) !== undefined;
  }

  keys(): string[] {
    return Object.keys(this.snapshot);
  }

  /**
   * 读取带标签的字段值
   *
   * 通过 applyType() 关联了类型定义时，按字段声明的种类解释。
   */
  field(name: string): FieldValue {
    return toFieldValue(this.get(name), this.type?.getField(name));
  }

  /** 文本或枚举字段的值 */
  text(name: string): string | undefined {
    const value = this.field(name);
    if (value.kind === 'text' || value.kind === 'enum') return value.value;
    if (value.kind === 'reference') return value.id;
    return undefined;
  }

  number(name: string): number | undefined {
    const value = this.field(name);
    if (value.kind === 'number') return value.value;
    if (value.kind === 'text' && value.value.trim() !== '' && Number.isFinite(Number(value.value))) {
      return Number(value.value);
    }
    return undefined;
  }

  date(name: string): Date | undefined {
    const value = this.field(name);
    if (value.kind === 'datetime') return value.value;
    if (value.kind === 'text') {
      const date = new Date(value.value);
      return Number.isNaN(date.getTime()) ? undefined : date;
    }
    return undefined;
  }

  /** 关联类型定义，用于 field() 的类型化 */
  applyType(type: ItemType): this {
    this.type = type;
    return this;
  }

  /**
   * 用自然语言更新此条目，并用服务端返回的快照刷新本地字段
   */
  async update(instruction: string): Promise<this> {
    this.assertAlive();
    const snapshot = await this.api.updateItem(this.id, instruction);
    this.snapshot = { ...snapshot };
    return this;
  }

  /**
   * 删除此条目。再次调用会抛出 InvalidStateError。
   */
  async delete(): Promise<void> {
    this.assertAlive();
    // 请求发出前即标记，重叠的 delete() 不再发请求；请求失败时恢复
    this.deleted = true;
    try {
      await this.api.deleteItem(this.id);
    } catch (err) {
      this.deleted = false;
      throw err;
    }
  }

  /** 返回快照副本 */
  toJSON(): ItemSnapshot {
    return { ...this.snapshot };
  }

  toString(): string {
    const lines = [`${this.label}(`];
    for (const key of Object.keys(this.snapshot).sort()) {
      const value = this.snapshot[key];
      const display = typeof value === 'string' && value.length > MAX_DISPLAY_LENGTH
        ? `${value.slice(0, MAX_DISPLAY_LENGTH - 3)}...`
        : JSON.stringify(value);
      lines.push(`  ${key.toLowerCase()}: ${display}`);
    }
    lines.push(')');
    return lines.join('\n');
  }

  protected assertAlive(): void {
    if (this.deleted) {
      throw new InvalidStateError(this.label, this.id);
    }
  }

  private stringField(name: string): string | undefined {
    const value = this.get(name);
    return typeof value === 'string' ? value : undefined;
  }
}

/**
 * 类型定义（Schema）
 */
export class ItemType extends Item {
  protected override readonly label: string = 'ItemType';

  /** 按顺序排列的字段定义 */
  get fields(): FieldDefinition[] {
    return parseFieldDefinitions(this.get('Fields'));
  }

  fieldNames(): string[] {
    return this.fields.map((field) => field.name);
  }

  /** 按名称查找字段定义，不区分大小写 */
  getField(name: string): FieldDefinition | undefined {
    const lower = name.toLowerCase();
    return this.fields.find((field) => field.name.toLowerCase() === lower);
  }

  hasField(name: string): boolean {
    return this.getField(name) !== undefined;
  }
}

/**
 * 文件夹：空间内条目的分组
 */
export class Folder extends Item {
  protected override readonly label: string = 'Folder';

  /** 在此文件夹内搜索 */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResults> {
    this.assertAlive();
    const page = await this.api.listItems(this.id, query, options.continuation);
    return new SearchResults(page.items, (snapshot) => new Item(snapshot, this.api), page.nextCursor);
  }

  /** 在此文件夹内新建条目 */
  async addItem(query: string): Promise<Item> {
    this.assertAlive();
    return new Item(await this.api.createItem('ITEM', query, this.id), this.api);
  }
}
