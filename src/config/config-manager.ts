/**
 * 配置管理器
 *
 * 加载 .env 文件、JSON 配置文件，应用环境变量覆盖，并使用 Zod 进行运行时验证。
 *
 * 加载顺序（优先级从低到高）：
 * 1. JSON 配置文件（drydotai.config.json）
 * 2. .env 文件中的环境变量
 * 3. 系统环境变量
 * 4. 调用方显式传入的选项
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import { ConfigSchema, type Config, type ConfigInput } from '../types/config.js';
import { ConfigError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('ConfigManager');

/** 默认配置文件路径列表（按优先级从高到低） */
const DEFAULT_CONFIG_PATHS = [
  'drydotai.config.json',
  'config/drydotai.json',
];

/** loadConfig 选项 */
export interface LoadConfigOptions {
  /** 配置文件路径，不指定时按默认路径查找 */
  configPath?: string;
  /** 是否加载 .env（默认 true） */
  loadEnv?: boolean;
  /** .env 文件路径（默认当前目录下的 .env） */
  envFile?: string;
  /** 环境变量来源（默认 process.env） */
  env?: NodeJS.ProcessEnv;
  /** 显式覆盖，优先级最高 */
  overrides?: ConfigInput;
}

/**
 * 从文件加载原始 JSON 配置
 */
async function loadConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`配置文件不存在: ${absolutePath}`, { path: absolutePath });
  }

  let parsed: unknown;
  try {
    const content = await readFile(absolutePath, 'utf-8');
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(
      `配置文件解析失败: ${absolutePath}`,
      { path: absolutePath },
      { cause: err },
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`配置文件格式无效，期望 JSON 对象: ${absolutePath}`, { path: absolutePath });
  }
  return parsed;
}

/**
 * 由 .env 文件注入 process.env 的值（不含原本就存在的环境变量）
 *
 * .env 同时也是默认的凭据文件，其中的 DRY_AI_TOKEN 由 TokenStore 管理（带保存时间），
 * 不应被当作显式凭据。
 */
const injectedFromEnvFile = new Map<string, string>();

/**
 * 加载 .env 文件并注入到 process.env
 *
 * 使用 dotenv 库，默认不覆盖已有的环境变量。
 * 文件不存在时跳过。
 */
function loadEnvFile(envFile: string): void {
  const envPath = resolve(envFile);
  if (!existsSync(envPath)) {
    log.debug({ path: envPath }, '未找到 .env 文件，跳过');
    return;
  }

  const existing = new Set(Object.keys(process.env));
  const result = dotenvConfig({ path: envPath });
  if (result.parsed) {
    for (const [key, value] of Object.entries(result.parsed)) {
      if (!existing.has(key)) {
        injectedFromEnvFile.set(key, value);
      }
    }
    log.debug({ count: Object.keys(result.parsed).length }, '已加载 .env');
  }
}

/** 该环境变量的当前值是否来自 .env 文件 */
function isFromEnvFile(env: NodeJS.ProcessEnv, key: string): boolean {
  const value = env[key];
  return value !== undefined && injectedFromEnvFile.get(key) === value;
}

/** 解析布尔型环境变量（true / 1 / yes） */
function parseBooleanEnv(value: string): boolean {
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * 从环境变量中提取配置覆盖
 *
 * 支持以下环境变量:
 * - DRY_AI_SERVER: 服务器地址
 * - DRY_AI_TOKEN: 凭据
 * - DRY_AI_VERBOSE: 成功调用是否输出确认日志
 * - DRY_AI_TIMEOUT_MS: 请求超时
 * - DRY_AI_READ_RETRIES: 只读请求超时后的重试次数
 * - DRY_AI_TOKEN_FILE: 凭据持久化文件
 * - DRY_AI_LOG_LEVEL: 日志级别
 */
export function getEnvOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  if (env['DRY_AI_SERVER']) {
    overrides['server'] = env['DRY_AI_SERVER'].replace(/\/+$/, '');
  }
  if (env['DRY_AI_TOKEN']) {
    overrides['token'] = env['DRY_AI_TOKEN'];
  }
  if (env['DRY_AI_VERBOSE']) {
    overrides['verbose'] = parseBooleanEnv(env['DRY_AI_VERBOSE']);
  }
  if (env['DRY_AI_TIMEOUT_MS']) {
    overrides['timeoutMs'] = Number(env['DRY_AI_TIMEOUT_MS']);
  }
  if (env['DRY_AI_READ_RETRIES']) {
    overrides['readRetries'] = Number(env['DRY_AI_READ_RETRIES']);
  }
  if (env['DRY_AI_TOKEN_FILE']) {
    overrides['tokenFile'] = env['DRY_AI_TOKEN_FILE'];
  }
  if (env['DRY_AI_LOG_LEVEL']) {
    overrides['logLevel'] = env['DRY_AI_LOG_LEVEL'];
  }

  return overrides;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * 深度合并两个对象
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];

    if (sourceVal === undefined) {
      continue;
    }
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }

  return result;
}

/**
 * 验证原始配置
 */
export function parseConfig(raw: Record<string, unknown>): Config {
  const parseResult = ConfigSchema.safeParse(raw);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(`配置验证失败: ${errors.join('; ')}`, { errors });
  }
  return parseResult.data;
}

/**
 * 加载并验证配置
 *
 * 1. 尝试从指定路径或默认路径加载配置文件
 * 2. 加载 .env 文件
 * 3. 应用环境变量覆盖与显式选项（.env 中的 DRY_AI_TOKEN 除外）
 * 4. 使用 Zod Schema 验证
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  if (options.loadEnv ?? true) {
    loadEnvFile(options.envFile ?? '.env');
  }

  let rawConfig: Record<string, unknown> = {};

  if (options.configPath) {
    rawConfig = await loadConfigFile(options.configPath);
    log.debug({ path: options.configPath }, '已加载配置文件');
  } else {
    for (const defaultPath of DEFAULT_CONFIG_PATHS) {
      const absolutePath = resolve(defaultPath);
      if (existsSync(absolutePath)) {
        rawConfig = await loadConfigFile(absolutePath);
        log.debug({ path: absolutePath }, '已加载配置文件');
        break;
      }
    }
  }

  const env = options.env ?? process.env;
  const envOverrides = getEnvOverrides(env);
  if (isFromEnvFile(env, 'DRY_AI_TOKEN')) {
    delete envOverrides['token'];
  }
  if (Object.keys(envOverrides).length > 0) {
    rawConfig = deepMerge(rawConfig, envOverrides);
    log.debug({ overrides: Object.keys(envOverrides) }, '已应用环境变量覆盖');
  }

  if (options.overrides) {
    rawConfig = deepMerge(rawConfig, { ...options.overrides });
  }

  return parseConfig(rawConfig);
}
