import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { AskUseCase, NO_CONTEXT_ANSWER, buildPrompt } from '../../src/application/AskUseCase.js';
import { ConversationUseCase } from '../../src/application/ConversationUseCase.js';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { SqliteVecAdapter } from '../../src/infrastructure/sqlite/SqliteVecAdapter.js';
import type { EmbeddingPort } from '../../src/domain/ports/EmbeddingPort.js';
import type { ChatMessage, LLMPort } from '../../src/domain/ports/LLMPort.js';
import {
  ConversationNotFoundError,
  LLMRateLimitError,
  LLMUnavailableError,
} from '../../src/domain/errors/DomainErrors.js';
import { Logger } from '../../src/shared/Logger.js';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

/**
 * Feature: 問答（RAG）
 *
 * 作為使用者，我需要以匯入的文件為依據得到回答，
 * 並在同一段對話中延續提問。
 */
describe('AskUseCase', () => {
  const tmpDir = path.join(os.tmpdir(), 'ragline-ask-' + Date.now());
  let dbMgr: DatabaseManager;
  let index: SqliteVecAdapter;
  let conversations: ConversationUseCase;
  let complete: Mock<(messages: ChatMessage[]) => Promise<string>>;
  let useCase: AskUseCase;

  beforeEach(() => {
    dbMgr = new DatabaseManager(path.join(tmpDir, 'test.db'), 2);
    index = new SqliteVecAdapter(dbMgr.getDb());
    conversations = new ConversationUseCase(dbMgr.getDb());

    index.upsert([
      {
        id: 'docs/a.md#0',
        vector: new Float32Array([1, 0]),
        metadata: { text: 'Invoices are sent monthly.', source: 'docs/a.md', chunkIndex: 0 },
      },
      {
        id: 'docs/b.md#0',
        vector: new Float32Array([0, 1]),
        metadata: { text: 'Refunds take five days.', source: 'docs/b.md', chunkIndex: 0 },
      },
    ]);

    // 所有問題都 embed 成 [1, 0]
    const embedding: EmbeddingPort = {
      providerId: 'mock',
      dimension: 2,
      modelId: 'mock-model',
      embed: vi.fn(async (texts: string[]) => texts.map(() => ({ vector: new Float32Array([1, 0]), tokensUsed: 1 }))),
      embedOne: vi.fn(async () => ({ vector: new Float32Array([1, 0]), tokensUsed: 1 })),
      isHealthy: vi.fn(async () => true),
    };

    complete = vi.fn(async (_messages: ChatMessage[]) => 'Monthly.');
    const llm: LLMPort = {
      providerId: 'mock',
      modelId: 'mock-chat',
      complete,
      isAvailable: vi.fn(async () => true),
    };

    useCase = new AskUseCase(embedding, index, llm, conversations, {
      defaultTopK: 3,
      sleep: async () => {},
      logger: new Logger('test', 'error'),
    });
  });

  afterEach(() => {
    dbMgr.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  /**
   * Scenario: 第一次提問
   * Given 未指定使用者與對話
   * Then 以 default_user 建立新對話，並記錄問答
   */
  it('should answer from the retrieved context and start a conversation', async () => {
    const response = await useCase.ask({ question: ' When are invoices sent? ', topK: 1 });

    expect(response).toEqual({
      answer: 'Monthly.',
      conversationId: 1,
      username: 'default_user',
      sources: [{ id: 'docs/a.md#0', source: 'docs/a.md', score: 1 }],
    });
    expect(complete).toHaveBeenCalledWith([{
      role: 'user',
      content: 'Based on the following context, answer the question:\n\n'
        + 'Context: Invoices are sent monthly.\n\n'
        + 'Question: When are invoices sent?\n\n'
        + 'Answer:',
    }]);

    expect(conversations.listConversations('default_user')[0].title).toBe('When are invoices sent?');
    expect(conversations.getMessages('default_user', 1).map((m) => [m.role, m.content])).toEqual([
      ['user', 'When are invoices sent?'],
      ['assistant', 'Monthly.'],
    ]);
  });

  it('should join every retrieved chunk into the context', async () => {
    await useCase.ask({ question: 'Billing?' });

    expect(complete).toHaveBeenCalledWith([{
      role: 'user',
      content: buildPrompt('Billing?', index.query(new Float32Array([1, 0]), 3)),
    }]);
    const [[messages]] = complete.mock.calls;
    expect(messages[0].content).toContain('Context: Invoices are sent monthly.\nRefunds take five days.\n\n');
  });

  it('should continue an existing conversation of the same user', async () => {
    const first = await useCase.ask({ question: 'First?', username: 'alice' });
    const second = await useCase.ask({
      question: 'Second?',
      username: 'alice',
      conversationId: first.conversationId,
    });

    expect(second.conversationId).toBe(first.conversationId);
    expect(conversations.getMessages('alice', first.conversationId)).toHaveLength(4);
    expect(conversations.listConversations('alice')).toHaveLength(1);
  });

  it('should refuse conversations owned by another user', async () => {
    const first = await useCase.ask({ question: 'Mine?', username: 'alice' });

    await expect(useCase.ask({ question: 'Theirs?', username: 'bob', conversationId: first.conversationId }))
      .rejects.toBeInstanceOf(ConversationNotFoundError);
    await expect(useCase.ask({ question: 'Nothing?', conversationId: 999 }))
      .rejects.toThrow('Conversation 999 not found');
  });

  it('should answer without the chat model when nothing is indexed', async () => {
    index.deleteBySource('docs/a.md');
    index.deleteBySource('docs/b.md');

    const response = await useCase.ask({ question: 'Anything?' });

    expect(response.answer).toBe(NO_CONTEXT_ANSWER);
    expect(response.sources).toEqual([]);
    expect(complete).not.toHaveBeenCalled();
  });

  it('should reject blank questions before touching storage', async () => {
    await expect(useCase.ask({ question: '   ' })).rejects.toThrow('question must not be empty');
    expect(conversations.findUserId('default_user')).toBeUndefined();
  });

  it('should title new conversations with the first 50 characters', async () => {
    const question = 'x'.repeat(60);
    await useCase.ask({ question });
    expect(conversations.listConversations('default_user')[0].title).toBe('x'.repeat(50));
  });

  it('should not split a surrogate pair when titling', async () => {
    const question = 'a'.repeat(49) + '😀b';
    await useCase.ask({ question });
    expect(conversations.listConversations('default_user')[0].title).toBe('a'.repeat(49) + '😀');
  });

  it('should retry the chat model when rate limited', async () => {
    complete.mockRejectedValueOnce(new LLMRateLimitError('slow down'));

    const response = await useCase.ask({ question: 'Retry?' });

    expect(response.answer).toBe('Monthly.');
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('should not retry other chat failures', async () => {
    complete.mockRejectedValue(new LLMUnavailableError('Chat completion failed: down'));

    await expect(useCase.ask({ question: 'Down?' })).rejects.toBeInstanceOf(LLMUnavailableError);
    expect(complete).toHaveBeenCalledTimes(1);
  });
});
