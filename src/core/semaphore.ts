/**
 * 计数信号量
 *
 * acquire() 返回一个释放函数；所有许可被占用时按 FIFO 顺序排队等待。
 * 认证会话用单许可的信号量保证同一时间只有一次凭据刷新。
 */

import { createChildLogger } from './logger.js';

const log = createChildLogger('Semaphore');

/** 释放许可的函数，重复调用无效果 */
export type Release = () => void;

export class Semaphore {
  private available: number;
  private readonly queue: Array<(release: Release) => void> = [];

  constructor(readonly permits: number = 1) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits 必须是 >= 1 的整数，收到: ${permits}`);
    }
    this.available = permits;
  }

  /**
   * 获取一个许可。如果无可用许可，阻塞等待。
   */
  acquire(): Promise<Release> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.createRelease());
    }

    log.debug({ waiting: this.queue.length + 1 }, '等待许可');
    return new Promise<Release>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * 在持有许可期间执行 task，结束后无论成败都释放许可
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  /** 当前等待者数量 */
  get waiting(): number {
    return this.queue.length;
  }

  /** 当前空闲许可数 */
  get free(): number {
    return this.available;
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        // 许可直接移交给队首，available 不变
        next(this.createRelease());
      } else {
        this.available++;
      }
    };
  }
}
