import type { Command } from 'commander';
import { createPipeline } from '../pipeline.js';
import { OutputFormatter, parseFormat, type OutputFormat } from '../formatters/OutputFormatter.js';

interface CheckCommandOptions {
  siteRoot: string;
  format: OutputFormat;
}

/** 註冊 check 指令：有任何被排除的文件時 exit code 為 1 */
export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Validate front matter of every document without writing anything')
    .option('--site-root <path>', 'Blog source root directory', '.')
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action(async (opts: CheckCommandOptions) => {
      const { config, useCase } = createPipeline(opts.siteRoot);
      const formatter = new OutputFormatter();

      const { report } = await useCase.run(opts.siteRoot, config, { write: false });

      process.stdout.write(formatter.formatReport(report, opts.format) + '\n');
      process.exitCode = report.issues.length === 0 ? 0 : 1;
    });
}
