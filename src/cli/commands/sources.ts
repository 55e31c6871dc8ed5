import type { Command } from 'commander';
import { createServices } from '../services.js';
import { commonOptionsSchema, parseOptions } from '../options.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';

/** 註冊 sources 指令群組 */
export function registerSourcesCommand(program: Command): void {
  const sourcesCmd = program
    .command('sources')
    .description('Inspect ingested sources');

  sourcesCmd
    .command('list')
    .description('List ingested sources')
    .option('--root <path>', 'Project root directory', '.')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action((rawOpts: unknown) => {
      const opts = parseOptions(commonOptionsSchema, rawOpts);
      const services = createServices(opts.root);
      try {
        const sources = services.ingest.listSources();
        process.stdout.write(new OutputFormatter().formatObject(sources, opts.format) + '\n');
      } finally {
        services.close();
      }
    });

  sourcesCmd
    .command('remove')
    .description('Remove a source and its vectors')
    .argument('<source>', 'Source path as listed by "sources list"')
    .option('--root <path>', 'Project root directory', '.')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action((source: string, rawOpts: unknown) => {
      const opts = parseOptions(commonOptionsSchema, rawOpts);
      const services = createServices(opts.root);
      try {
        const removed = services.ingest.removeSource(source);
        process.stdout.write(new OutputFormatter().formatObject({ source, removed }, opts.format) + '\n');
        if (!removed) process.exitCode = 1;
      } finally {
        services.close();
      }
    });
}
