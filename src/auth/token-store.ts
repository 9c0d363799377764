/**
 * 凭据持久化
 *
 * 凭据以 .env 格式保存在 tokenFile 中，便于跨进程复用：
 *   DRY_AI_TOKEN=<token>
 *   DRY_AI_TOKEN_SAVED_AT=<毫秒时间戳>
 *
 * 文件中的其它行原样保留；被注释掉的 `# DRY_AI_TOKEN=` 行和 `export DRY_AI_TOKEN=` 行会被替换。
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import type { Credential } from '../types/auth.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('TokenStore');

export const TOKEN_KEY = 'DRY_AI_TOKEN';
export const SAVED_AT_KEY = 'DRY_AI_TOKEN_SAVED_AT';

/** 判断某一行是否为 key 的赋值（包括注释掉的和带 export 前缀的） */
function isAssignment(line: string, key: string): boolean {
  return new RegExp(`^\\s*(#\\s*)?(export\\s+)?${key}\\s*=`).test(line);
}

export class TokenStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
  }

  /**
   * 读取已保存的凭据，文件或键不存在时返回 null
   */
  async load(): Promise<Credential | null> {
    if (!existsSync(this.filePath)) {
      return null;
    }

    const content = await readFile(this.filePath, 'utf-8');
    const parsed = parseDotenv(content);
    const token = parsed[TOKEN_KEY];
    if (!token) {
      return null;
    }

    const savedAt = Number(parsed[SAVED_AT_KEY]);
    return {
      token,
      savedAt: Number.isFinite(savedAt) && savedAt > 0 ? savedAt : undefined,
    };
  }

  /**
   * 保存凭据，替换已有的赋值行，其它行保持不变
   */
  async save(token: string, savedAt: number = Date.now()): Promise<Credential> {
    const values: Array<[string, string]> = [
      [TOKEN_KEY, token],
      [SAVED_AT_KEY, String(savedAt)],
    ];

    const lines = await this.readLines();
    const written = new Set<string>();
    const output: string[] = [];

    for (const line of lines) {
      const match = values.find(([key]) => isAssignment(line, key));
      if (!match) {
        output.push(line);
        continue;
      }
      const [key, value] = match;
      // 同一个键出现多次时只保留第一处
      if (!written.has(key)) {
        output.push(`${key}=${value}`);
        written.add(key);
      }
    }

    for (const [key, value] of values) {
      if (!written.has(key)) {
        output.push(`${key}=${value}`);
      }
    }

    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${output.join('\n')}\n`, { encoding: 'utf-8', mode: 0o600 });
    log.debug({ path: this.filePath }, '凭据已保存');

    return { token, savedAt };
  }

  /**
   * 删除已保存的凭据，返回被移除的行数
   */
  async clear(): Promise<number> {
    if (!existsSync(this.filePath)) {
      return 0;
    }

    const lines = await this.readLines();
    const kept = lines.filter((line) => !isAssignment(line, TOKEN_KEY) && !isAssignment(line, SAVED_AT_KEY));
    const removed = lines.length - kept.length;

    if (removed > 0) {
      await writeFile(this.filePath, kept.length > 0 ? `${kept.join('\n')}\n` : '', 'utf-8');
      log.debug({ path: this.filePath, removed }, '凭据已清除');
    }
    return removed;
  }

  /** 读取文件的所有行（去掉末尾空行） */
  private async readLines(): Promise<string[]> {
    if (!existsSync(this.filePath)) {
      return [];
    }
    const content = await readFile(this.filePath, 'utf-8');
    const lines = content.split(/\r?\n/);
    while (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  }
}
