import type { Command } from 'commander';
import { z } from 'zod';
import { createServices } from '../services.js';
import { commonOptionsSchema, parseOptions, positiveIntOption } from '../options.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';

const askOptionsSchema = commonOptionsSchema.extend({
  user: z.string().optional(),
  conversation: positiveIntOption.optional(),
  topK: positiveIntOption.optional(),
});

/** 註冊 ask 指令 */
export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Answer a question from the ingested documents')
    .argument('<question>', 'Question to ask')
    .option('--root <path>', 'Project root directory', '.')
    .option('--user <username>', 'Username owning the conversation (default: default_user)')
    .option('--conversation <id>', 'Continue an existing conversation')
    .option('--top-k <n>', 'Number of chunks to retrieve')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (question: string, rawOpts: unknown) => {
      const opts = parseOptions(askOptionsSchema, rawOpts);
      const formatter = new OutputFormatter();
      const services = createServices(opts.root);

      try {
        const response = await services.ask.ask({
          question,
          username: opts.user,
          conversationId: opts.conversation,
          topK: opts.topK,
        });
        process.stdout.write(formatter.formatAnswer(response, opts.format) + '\n');
      } finally {
        services.close();
      }
    });
}
