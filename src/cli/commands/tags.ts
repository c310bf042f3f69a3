import type { Command } from 'commander';
import { createPipeline } from '../pipeline.js';
import { OutputFormatter, parseFormat, type OutputFormat } from '../formatters/OutputFormatter.js';

interface TagsCommandOptions {
  siteRoot: string;
  format: OutputFormat;
}

/** 註冊 tags 指令 */
export function registerTagsCommand(program: Command): void {
  program
    .command('tags')
    .description('List every tag with the number of posts carrying it')
    .option('--site-root <path>', 'Blog source root directory', '.')
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action(async (opts: TagsCommandOptions) => {
      const { config, useCase } = createPipeline(opts.siteRoot);
      const formatter = new OutputFormatter();

      const { index } = await useCase.run(opts.siteRoot, config, { write: false });

      process.stdout.write(formatter.formatTagCounts(index.tags(), opts.format) + '\n');
    });
}
