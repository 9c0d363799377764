/**
 * 搜索结果
 *
 * 一次服务端往返得到的有限结果序列。遍历时才把快照包装成 Item，
 * 只能遍历一次：已经取出的元素不会再次出现。
 * 服务端返回 nextCursor 时，continuation 可用于请求下一页。
 */

import type { ItemSnapshot } from '../types/item.js';
import type { Item } from './item.js';

export class SearchResults implements Iterable<Item> {
  private position = 0;

  constructor(
    private readonly snapshots: readonly ItemSnapshot[],
    private readonly wrap: (snapshot: ItemSnapshot) => Item,
    /** 下一页游标 */
    readonly continuation?: string,
  ) {}

  /** 本页结果总数 */
  get size(): number {
    return this.snapshots.length;
  }

  /** 尚未取出的结果数 */
  get remaining(): number {
    return this.snapshots.length - this.position;
  }

  /** 服务端是否还有下一页 */
  get hasMore(): boolean {
    return this.continuation !== undefined;
  }

  next(): IteratorResult<Item> {
    const snapshot = this.snapshots[this.position];
    if (snapshot === undefined) {
      return { done: true, value: undefined };
    }
    this.position++;
    return { done: false, value: this.wrap(snapshot) };
  }

  [Symbol.iterator](): Iterator<Item> {
    return { next: () => this.next() };
  }

  /** 取出剩余的全部结果 */
  toArray(): Item[] {
    return Array.from(this);
  }
}
