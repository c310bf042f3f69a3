import type { Command } from 'commander';
import { createPipeline } from '../pipeline.js';
import { OutputFormatter, parseFormat, type OutputFormat } from '../formatters/OutputFormatter.js';

interface ListCommandOptions {
  siteRoot: string;
  tag?: string;
  format: OutputFormat;
}

/** 註冊 list 指令 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List posts newest first, optionally only those carrying a tag')
    .option('--site-root <path>', 'Blog source root directory', '.')
    .option('--tag <tag>', 'Only posts carrying this tag')
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action(async (opts: ListCommandOptions) => {
      const { config, useCase } = createPipeline(opts.siteRoot);
      const formatter = new OutputFormatter();

      const { index } = await useCase.run(opts.siteRoot, config, { write: false });
      const posts = opts.tag === undefined ? index.chronological() : index.postsTagged(opts.tag);

      process.stdout.write(formatter.formatPosts(posts, opts.format) + '\n');
    });
}
