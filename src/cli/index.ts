#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { registerIngestCommand } from './commands/ingest.js';
import { registerAskCommand } from './commands/ask.js';
import { registerConversationsCommand } from './commands/conversations.js';
import { registerSourcesCommand } from './commands/sources.js';
import { registerHealthCommand } from './commands/health.js';
import { formatCliError } from './errors.js';

// 從 package.json 讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../../package.json'));

const program = new Command();

program
  .name('ragline')
  .description('Ingest documents into a local vector index and answer questions over them')
  .version(version)
  // 全域錯誤處理；需在註冊子指令前設定才會被繼承
  .exitOverride();

registerIngestCommand(program);
registerAskCommand(program);
registerConversationsCommand(program);
registerSourcesCommand(program);
registerHealthCommand(program);

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander 已自行輸出 help/version 或用法錯誤
      process.exit(err.exitCode);
    }
    process.stderr.write(formatCliError(err) + '\n');
    process.exit(1);
  }
}

void main();
