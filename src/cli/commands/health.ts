import type { Command } from 'commander';
import { z } from 'zod';
import { createServices } from '../services.js';
import { commonOptionsSchema, parseOptions } from '../options.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';

const healthOptionsSchema = commonOptionsSchema.extend({
  fix: z.boolean().default(false),
  checkServices: z.boolean().default(false),
});

/** 註冊 health 指令 */
export function registerHealthCommand(program: Command): void {
  program
    .command('health')
    .description('Check index health and consistency')
    .option('--root <path>', 'Project root directory', '.')
    .option('--fix', 'Delete orphaned vector metadata', false)
    .option('--check-services', 'Also check that the embedding and chat services respond', false)
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (rawOpts: unknown) => {
      const opts = parseOptions(healthOptionsSchema, rawOpts);
      const services = createServices(opts.root);

      try {
        const report = await services.health.check({ fix: opts.fix, checkServices: opts.checkServices });
        process.stdout.write(new OutputFormatter().formatObject(report, opts.format) + '\n');
        process.exitCode = report.healthy ? 0 : 1;
      } finally {
        services.close();
      }
    });
}
