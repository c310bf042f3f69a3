#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerBuildCommand } from './commands/build.js';
import { registerCheckCommand } from './commands/check.js';
import { registerListCommand } from './commands/list.js';
import { registerTagsCommand } from './commands/tags.js';

// 從 package.json 動態讀取版本號
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('postindex')
  .description('Validate blog front matter and build chronological and tag navigation for a static site')
  .version(version);

registerBuildCommand(program);
registerCheckCommand(program);
registerListCommand(program);
registerTagsCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    const message = err instanceof Error ? err.message : 'Unknown error';
    process.stderr.write(`Error: ${message}\n`);
    process.exit(1);
  }
}

void main();
