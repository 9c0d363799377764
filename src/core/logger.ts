/**
 * 结构化日志系统
 *
 * 使用 pino 提供 JSON 格式的结构化日志。
 * 日志级别来自 DRY_AI_LOG_LEVEL，设为 silent 时完全关闭输出。
 */

import pino from 'pino';

/** 创建 logger 实例 */
function createLogger(level: string = process.env['DRY_AI_LOG_LEVEL'] || 'info'): pino.Logger {
  if (level === 'silent') {
    return pino({ level });
  }
  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    },
  });
}

/** 全局 logger */
const logger = createLogger();

/** 已创建的子 logger（按模块名），级别变更时同步 */
const children = new Map<string, pino.Logger>();

/** 更新日志级别（包括已创建的子 logger） */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children.values()) {
    child.level = level;
  }
}

/** 获取 logger 实例 */
export function getLogger(): pino.Logger {
  return logger;
}

/** 获取子 logger（带模块标签），同一模块名返回同一个实例 */
export function createChildLogger(module: string): pino.Logger {
  const existing = children.get(module);
  if (existing) {
    return existing;
  }
  const child = logger.child({ module });
  children.set(module, child);
  return child;
}

export { logger };
