import { describe, it, expect, vi, beforeEach } from 'vitest';
import { HttpLLMAdapter } from '../../../src/infrastructure/llm/HttpLLMAdapter.js';
import { LLMRateLimitError, LLMUnavailableError } from '../../../src/domain/errors/DomainErrors.js';

/**
 * Feature: HTTP LLM Adapter（OpenAI-compatible）
 *
 * 作為問答流程，我需要透過 chat completions API 產生回答。
 */

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      chat = {
        completions: {
          create: mockCreate,
        },
      };
    },
  };
});

describe('HttpLLMAdapter', () => {
  let adapter: HttpLLMAdapter;

  beforeEach(() => {
    mockCreate.mockReset();
    adapter = new HttpLLMAdapter({
      baseUrl: 'http://localhost:11434/v1',
      model: 'mistral-small-2506',
      temperature: 0.3,
    });
    vi.spyOn(process.stderr, 'write').mockReturnValue(true);
  });

  /**
   * Scenario: 成功回答
   * Given 模型回傳前後帶空白的文字
   * Then 回傳 trim 後的內容
   */
  it('should return the trimmed completion', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: '  Paris.\n' } }] });

    const answer = await adapter.complete([{ role: 'user', content: 'Capital of France?' }]);

    expect(answer).toBe('Paris.');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'mistral-small-2506',
      messages: [{ role: 'user', content: 'Capital of France?' }],
      temperature: 0.3,
    });
  });

  it('should return an empty string when the model returns no content', async () => {
    mockCreate.mockResolvedValue({ choices: [] });
    expect(await adapter.complete([{ role: 'user', content: 'hi' }])).toBe('');
  });

  it('should map 429 responses to LLMRateLimitError', async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error('Too Many Requests'), { status: 429 }));
    await expect(adapter.complete([{ role: 'user', content: 'hi' }]))
      .rejects.toBeInstanceOf(LLMRateLimitError);
  });

  it('should map other failures to LLMUnavailableError', async () => {
    mockCreate.mockRejectedValue(new Error('timeout'));
    const promise = adapter.complete([{ role: 'user', content: 'hi' }]);
    await expect(promise).rejects.toBeInstanceOf(LLMUnavailableError);
    await expect(promise).rejects.toThrow('Chat completion failed: timeout');
  });

  it('should report availability from a ping request', async () => {
    mockCreate.mockResolvedValueOnce({ choices: [{ message: { content: 'pong' } }] });
    expect(await adapter.isAvailable()).toBe(true);

    mockCreate.mockRejectedValueOnce(new Error('offline'));
    expect(await adapter.isAvailable()).toBe(false);
  });
});
