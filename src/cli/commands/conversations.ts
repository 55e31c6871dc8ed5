import type { Command } from 'commander';
import { z } from 'zod';
import { createServices } from '../services.js';
import { commonOptionsSchema, parseOptions, positiveIntOption } from '../options.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';

const createOptionsSchema = commonOptionsSchema.extend({
  title: z.string().optional(),
});

/** 註冊 conversations 指令群組 */
export function registerConversationsCommand(program: Command): void {
  const conversationsCmd = program
    .command('conversations')
    .description('Manage conversation history');

  conversationsCmd
    .command('list')
    .description('List conversations of a user, newest first')
    .argument('<username>')
    .option('--root <path>', 'Project root directory', '.')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action((username: string, rawOpts: unknown) => {
      const opts = parseOptions(commonOptionsSchema, rawOpts);
      const services = createServices(opts.root);
      try {
        const list = services.conversations.listConversations(username);
        process.stdout.write(new OutputFormatter().formatObject(list, opts.format) + '\n');
      } finally {
        services.close();
      }
    });

  conversationsCmd
    .command('show')
    .description('Show the messages of a conversation')
    .argument('<username>')
    .argument('<id>')
    .option('--root <path>', 'Project root directory', '.')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action((username: string, rawId: string, rawOpts: unknown) => {
      const opts = parseOptions(commonOptionsSchema, rawOpts);
      const conversationId = parseOptions(z.object({ id: positiveIntOption }), { id: rawId }).id;
      const services = createServices(opts.root);
      try {
        const messages = services.conversations.getMessages(username, conversationId);
        process.stdout.write(new OutputFormatter().formatObject(messages, opts.format) + '\n');
      } finally {
        services.close();
      }
    });

  conversationsCmd
    .command('create')
    .description('Start a new conversation')
    .argument('<username>')
    .option('--title <title>', 'Conversation title')
    .option('--root <path>', 'Project root directory', '.')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action((username: string, rawOpts: unknown) => {
      const opts = parseOptions(createOptionsSchema, rawOpts);
      const services = createServices(opts.root);
      try {
        const userId = services.conversations.getOrCreateUser(username);
        const conversation = services.conversations.createConversation(userId, opts.title);
        process.stdout.write(new OutputFormatter().formatObject(conversation, opts.format) + '\n');
      } finally {
        services.close();
      }
    });

  conversationsCmd
    .command('delete')
    .description('Delete a conversation and its messages')
    .argument('<id>')
    .option('--root <path>', 'Project root directory', '.')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action((rawId: string, rawOpts: unknown) => {
      const opts = parseOptions(commonOptionsSchema, rawOpts);
      const conversationId = parseOptions(z.object({ id: positiveIntOption }), { id: rawId }).id;
      const services = createServices(opts.root);
      try {
        const deleted = services.conversations.deleteConversation(conversationId);
        process.stdout.write(
          new OutputFormatter().formatObject({ conversationId, deleted }, opts.format) + '\n',
        );
        if (!deleted) process.exitCode = 1;
      } finally {
        services.close();
      }
    });
}
