import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { LLMPort } from '../domain/ports/LLMPort.js';
import type { VectorIndexPort, VectorMatch } from '../domain/ports/VectorIndexPort.js';
import { LLMRateLimitError } from '../domain/errors/DomainErrors.js';
import type { ConversationUseCase } from './ConversationUseCase.js';
import type { AskRequest } from './dto/AskRequest.js';
import type { AskResponse } from './dto/AskResponse.js';
import { withRetry } from '../shared/RetryPolicy.js';
import { Logger } from '../shared/Logger.js';

export const DEFAULT_USERNAME = 'default_user';
export const NO_CONTEXT_ANSWER = 'No relevant documents found.';

export interface AskUseCaseOptions {
  defaultTopK?: number;
  /** chat 被限流時的重試設定 */
  maxRetries?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/** 對話標題：問題的前 50 個字元（以 code point 計） */
export function conversationTitle(question: string): string {
  return Array.from(question).slice(0, 50).join('');
}

/** 以檢索到的 chunk 組成提示詞 */
export function buildPrompt(question: string, matches: VectorMatch[]): string {
  const context = matches.map((m) => m.metadata.text).join('\n');
  return `Based on the following context, answer the question:

Context: ${context}

Question: ${question}

Answer:`;
}

/**
 * 問答用例（RAG）
 *
 * 流程：使用者/對話 → 記錄提問 → embedding → 向量檢索 → chat 模型 → 記錄回答
 */
export class AskUseCase {
  private readonly defaultTopK: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(
    private readonly embedding: EmbeddingPort,
    private readonly index: VectorIndexPort,
    private readonly llm: LLMPort,
    private readonly conversations: ConversationUseCase,
    options: AskUseCaseOptions = {},
  ) {
    this.defaultTopK = options.defaultTopK ?? 3;
    this.maxRetries = options.maxRetries ?? 2;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.sleep = options.sleep;
    this.logger = options.logger ?? new Logger('AskUseCase');
  }

  async ask(request: AskRequest): Promise<AskResponse> {
    const question = request.question.trim();
    if (!question) {
      throw new Error('question must not be empty');
    }

    const username = request.username?.trim() || DEFAULT_USERNAME;
    const userId = this.conversations.getOrCreateUser(username);

    const conversationId = request.conversationId === undefined
      ? this.conversations.createConversation(userId, conversationTitle(question)).conversationId
      : this.conversations.requireOwnedConversation(userId, request.conversationId).conversationId;

    this.conversations.addMessage(conversationId, 'user', question);

    const { vector } = await this.embedding.embedOne(question);
    const matches = this.index.query(vector, request.topK ?? this.defaultTopK);
    this.logger.debug('Retrieved context', { conversationId, matches: matches.length });

    const answer = matches.length === 0
      ? NO_CONTEXT_ANSWER
      : await this.generate(buildPrompt(question, matches));

    this.conversations.addMessage(conversationId, 'assistant', answer);

    return {
      answer,
      conversationId,
      username,
      sources: matches.map((m) => ({ id: m.id, source: m.metadata.source, score: m.score })),
    };
  }

  private generate(prompt: string): Promise<string> {
    return withRetry(
      () => this.llm.complete([{ role: 'user', content: prompt }]),
      {
        maxRetries: this.maxRetries,
        baseDelayMs: this.baseDelayMs,
        isRetryable: (err) => err instanceof LLMRateLimitError,
        sleep: this.sleep,
        onRetry: (attempt, _err, delayMs) =>
          this.logger.warn('Chat model rate limited, retrying', { attempt, delayMs: Math.round(delayMs) }),
      },
    );
  }
}
