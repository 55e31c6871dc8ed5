import OpenAI from 'openai';
import type { ChatMessage, LLMPort } from '../../domain/ports/LLMPort.js';
import { LLMRateLimitError, LLMUnavailableError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

/**
 * HTTP LLM Adapter
 *
 * 透過 OpenAI-compatible chat completions API 呼叫遠端模型
 * （Mistral、OpenAI、Ollama、vLLM 等）。
 * 429 轉為 LLMRateLimitError 交由呼叫端重試，其餘轉為 LLMUnavailableError。
 */

export interface HttpLLMConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  temperature?: number;
  timeoutMs?: number;
}

export class HttpLLMAdapter implements LLMPort {
  readonly providerId = 'openai-compatible';
  readonly modelId: string;
  private readonly client: OpenAI;
  private readonly temperature: number;
  private readonly logger = new Logger('HttpLLMAdapter');

  constructor(config: HttpLLMConfig) {
    this.modelId = config.model;
    this.temperature = config.temperature ?? 0.3;

    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: config.timeoutMs ?? 30000,
    });
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.modelId,
        messages,
        temperature: this.temperature,
      });
      return response.choices[0]?.message?.content?.trim() ?? '';
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn('Chat completion failed', { error: message });
      if (typeof err === 'object' && err !== null && 'status' in err && err.status === 429) {
        throw new LLMRateLimitError(`Rate limited by chat model: ${message}`, { cause: err });
      }
      throw new LLMUnavailableError(`Chat completion failed: ${message}`, { cause: err });
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.chat.completions.create({
        model: this.modelId,
        messages: [{ role: 'user', content: 'ping' }],
        max_tokens: 1,
      });
      return true;
    } catch {
      return false;
    }
  }
}
