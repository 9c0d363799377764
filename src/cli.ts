#!/usr/bin/env node

/**
 * drydotai 命令行工具
 *
 * 入口文件：解析 CLI 参数并调用客户端。
 */

import { createInterface } from 'node:readline';
import { Command } from 'commander';
import { createClientFromConfig, type SpaceClient } from './client/space-client.js';
import type { Item } from './client/item.js';
import { loadConfig } from './config/config-manager.js';
import { DryAIError } from './core/errors.js';
import { logger, setLogLevel } from './core/logger.js';
import type { PendingChallenge } from './types/auth.js';

/** 全局选项 */
interface GlobalOptions {
  config?: string;
  server?: string;
  email?: string;
  verbose?: boolean;
}

/** 在终端上提问并返回去掉首尾空白的回答 */
function ask(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: true });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function promptCode(challenge: PendingChallenge): Promise<string> {
  console.log(`\n📨 验证码已发送到 ${challenge.email}，请查收邮件`);
  return ask('请输入验证码: ');
}

const program = new Command();

program
  .name('drydotai')
  .description('Dry.ai 结构化数据服务的命令行客户端')
  .version('0.2.0')
  .option('-c, --config <path>', '配置文件路径')
  .option('-s, --server <url>', '服务器地址')
  .option('-e, --email <email>', '没有凭据时用此邮箱自动认证')
  .option('-v, --verbose', '输出每次成功调用的确认日志');

async function openClient(): Promise<SpaceClient> {
  const options = program.opts<GlobalOptions>();
  const config = await loadConfig({
    configPath: options.config,
    overrides: { server: options.server, verbose: options.verbose },
  });
  if (config.verbose && (config.logLevel === 'warn' || config.logLevel === 'error')) {
    setLogLevel('info');
  } else {
    setLogLevel(config.logLevel);
  }
  return createClientFromConfig(config, {
    email: options.email,
    codeProvider: promptCode,
  });
}

/** 执行命令，统一处理错误 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      if (err instanceof DryAIError) {
        console.error(`❌ ${err.message}`);
      } else {
        logger.error({ err }, '命令执行失败');
      }
      process.exitCode = 1;
    }
  };
}

function printItem(item: Item): void {
  console.log(item.toString());
}

program
  .command('login')
  .description('通过邮箱验证码登录并保存凭据')
  .action(run(async () => {
    const client = await openClient();
    const email = program.opts<GlobalOptions>().email || await ask('请输入邮箱: ');
    await client.session.login(email, promptCode);
    console.log('✅ 认证成功，凭据已保存');
  }));

program
  .command('logout')
  .description('清除已保存的凭据')
  .action(run(async () => {
    const client = await openClient();
    await client.session.logout();
    console.log('🔓 凭据已清除');
  }));

program
  .command('status')
  .description('显示认证状态')
  .action(run(async () => {
    const client = await openClient();
    const authenticated = await client.session.isAuthenticated();
    console.log(authenticated ? '✅ 已认证' : '⚠️  未认证，请运行 drydotai login');
  }));

program
  .command('config')
  .description('验证并显示当前配置')
  .action(run(async () => {
    const options = program.opts<GlobalOptions>();
    const config = await loadConfig({ configPath: options.config });
    console.log(JSON.stringify({ ...config, token: config.token ? '***' : undefined }, null, 2));
  }));

program
  .command('create-space')
  .description('用自然语言描述创建空间')
  .argument('<description>', '空间描述')
  .action(run(async (description: string) => {
    const client = await openClient();
    const space = await client.createSpace(description);
    printItem(space);
  }));

program
  .command('get-space')
  .description('按自然语言查询或 ID 获取空间')
  .argument('<query>', '查询或 ID')
  .option('--id', '把参数当作空间 ID')
  .action(run(async (query: string, options: { id?: boolean }) => {
    const client = await openClient();
    const space = options.id ? await client.getSpaceById(query) : await client.getSpace(query);
    printItem(space);
  }));

program
  .command('add')
  .description('在空间中新建类型、条目或文件夹')
  .argument('<spaceId>', '空间 ID')
  .argument('<kind>', 'type | item | folder')
  .argument('<description>', '自然语言描述')
  .action(run(async (spaceId: string, kind: string, description: string) => {
    const client = await openClient();
    const space = await client.getSpaceById(spaceId);
    switch (kind) {
      case 'type':
        printItem(await space.addType(description));
        break;
      case 'item':
        printItem(await space.addItem(description));
        break;
      case 'folder':
        printItem(await space.addFolder(description));
        break;
      default:
        throw new DryAIError(`未知的种类: ${kind}（可选 type、item、folder）`, 'INVALID_ARGUMENT');
    }
  }));

program
  .command('search')
  .description('在空间中搜索')
  .argument('<spaceId>', '空间 ID')
  .argument('<query>', '自然语言查询')
  .option('--cursor <cursor>', '上一页返回的游标')
  .action(run(async (spaceId: string, query: string, options: { cursor?: string }) => {
    const client = await openClient();
    const space = await client.getSpaceById(spaceId);
    const results = await space.search(query, { continuation: options.cursor });
    console.log(`找到 ${results.size} 个条目:`);
    for (const item of results) {
      console.log(`  - ${item.name ?? item.id}`);
    }
    if (results.continuation) {
      console.log(`更多结果: --cursor ${results.continuation}`);
    }
  }));

program
  .command('prompt')
  .description('让服务端按指令处理输入')
  .argument('<spaceId>', '空间 ID')
  .argument('<instruction>', '自然语言指令')
  .action(run(async (spaceId: string, instruction: string) => {
    const client = await openClient();
    const space = await client.getSpaceById(spaceId);
    const items = await space.prompt(instruction);
    console.log(`处理完成，涉及 ${items.length} 个条目`);
    items.forEach(printItem);
  }));

program
  .command('report')
  .description('生成文本报告')
  .argument('<spaceId>', '空间 ID')
  .argument('<request>', '报告要求')
  .action(run(async (spaceId: string, request: string) => {
    const client = await openClient();
    const space = await client.getSpaceById(spaceId);
    console.log(await space.report(request));
  }));

program
  .command('update')
  .description('用自然语言更新空间或其中的条目')
  .argument('<spaceId>', '空间 ID')
  .argument('<instruction>', '自然语言指令')
  .option('--item <itemId>', '只更新这个条目')
  .option('--all', '批量更新空间内匹配的条目')
  .action(run(async (spaceId: string, instruction: string, options: { item?: string; all?: boolean }) => {
    const client = await openClient();
    const space = await client.getSpaceById(spaceId);
    if (options.item) {
      const item = await space.getItem(options.item);
      printItem(await item.update(instruction));
    } else if (options.all) {
      const items = await space.updateItems(instruction);
      console.log(`已更新 ${items.length} 个条目`);
    } else {
      printItem(await space.update(instruction));
    }
  }));

program
  .command('delete')
  .description('删除空间、条目或匹配条件的条目')
  .argument('<spaceId>', '空间 ID')
  .option('--item <itemId>', '只删除这个条目')
  .option('--where <query>', '删除空间内匹配条件的条目')
  .action(run(async (spaceId: string, options: { item?: string; where?: string }) => {
    const client = await openClient();
    const space = await client.getSpaceById(spaceId);
    if (options.item) {
      await (await space.getItem(options.item)).delete();
      console.log(`🗑️  已删除条目 ${options.item}`);
    } else if (options.where !== undefined) {
      await space.deleteItems(options.where);
      console.log('🗑️  已删除匹配的条目');
    } else {
      await space.delete();
      console.log(`🗑️  已删除空间 ${spaceId}`);
    }
  }));

program.parseAsync().catch((err: unknown) => {
  logger.fatal({ err }, '启动失败');
  process.exit(1);
});
