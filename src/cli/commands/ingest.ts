import type { Command } from 'commander';
import { z } from 'zod';
import { createServices } from '../services.js';
import { commonOptionsSchema, parseOptions, positiveIntOption } from '../options.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';

const ingestOptionsSchema = commonOptionsSchema.extend({
  force: z.boolean().default(false),
  batchSize: positiveIntOption.optional(),
  delayMs: z.coerce.number().int().nonnegative().optional(),
});

/** 註冊 ingest 指令 */
export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Load documents, embed their chunks and store them in the vector index')
    .argument('<paths...>', 'Files or directories to ingest')
    .option('--root <path>', 'Project root directory', '.')
    .option('--force', 'Re-ingest files whose content has not changed', false)
    .option('--batch-size <n>', 'Chunks per embedding request')
    .option('--delay-ms <n>', 'Pause between embedding requests in milliseconds')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (paths: string[], rawOpts: unknown) => {
      const opts = parseOptions(ingestOptionsSchema, rawOpts);
      const formatter = new OutputFormatter();
      const services = createServices(opts.root, {
        embedding: { batchSize: opts.batchSize, delayMs: opts.delayMs },
      });

      try {
        const stats = await services.ingest.ingest(paths, {
          root: services.root,
          force: opts.force,
        });
        process.stdout.write(formatter.formatObject(stats, opts.format) + '\n');
      } finally {
        services.close();
      }
    });
}
