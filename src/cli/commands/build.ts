import type { Command } from 'commander';
import { createPipeline } from '../pipeline.js';
import { OutputFormatter, parseFormat, type OutputFormat } from '../formatters/OutputFormatter.js';

interface BuildCommandOptions {
  siteRoot: string;
  dryRun: boolean;
  format: OutputFormat;
}

/** 註冊 build 指令 */
export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build the navigation index and write it for the site builder')
    .option('--site-root <path>', 'Blog source root directory', '.')
    .option('--dry-run', 'Build in memory without writing the manifest', false)
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action(async (opts: BuildCommandOptions) => {
      const { config, useCase } = createPipeline(opts.siteRoot);
      const formatter = new OutputFormatter();

      const { report } = await useCase.run(opts.siteRoot, config, { write: !opts.dryRun });

      process.stdout.write(formatter.formatReport(report, opts.format) + '\n');
    });
}
