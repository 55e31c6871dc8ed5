/**
 * Chat 模型抽象介面
 *
 * AskUseCase 只依賴 complete()，不直接接觸 SDK。
 */

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMPort {
  readonly providerId: string;
  readonly modelId: string;

  /**
   * 送出對話並回傳模型的文字回覆
   * @throws LLMRateLimitError 被限流時
   * @throws LLMUnavailableError 其他失敗
   */
  complete(messages: ChatMessage[]): Promise<string>;

  isAvailable(): Promise<boolean>;
}
