export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** Embedding 失敗分類：決定 pipeline 要退避重試、縮小批次，或線性重試 */
export type EmbeddingFailureKind = 'rate_limit' | 'payload_too_large' | 'transient';

/** 所有 ragline domain 錯誤的基底類別 */
export abstract class RaglineError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Retryable ---

export class EmbeddingRateLimitError extends RaglineError {
  readonly classification = 'retryable' as const;
  readonly code = 'EMBEDDING_RATE_LIMIT';
}

/** 暫時性錯誤（網路、5xx、回應格式不符） */
export class EmbeddingUnavailableError extends RaglineError {
  readonly classification = 'retryable' as const;
  readonly code = 'EMBEDDING_UNAVAILABLE';
}

export class LLMRateLimitError extends RaglineError {
  readonly classification = 'retryable' as const;
  readonly code = 'LLM_RATE_LIMIT';
}

// --- Degradable ---

/** 批次 token 總數超過服務上限；可藉由縮小批次恢復 */
export class EmbeddingPayloadTooLargeError extends RaglineError {
  readonly classification = 'degradable' as const;
  readonly code = 'EMBEDDING_PAYLOAD_TOO_LARGE';
}

export class LLMUnavailableError extends RaglineError {
  readonly classification = 'degradable' as const;
  readonly code = 'LLM_UNAVAILABLE';
}

// --- Manual ---

export class EmbeddingPipelineError extends RaglineError {
  readonly classification = 'manual' as const;
  readonly code = 'EMBEDDING_PIPELINE_FAILED';

  constructor(
    message: string,
    public readonly batchNumber: number,
    public readonly attempts: number,
    public readonly failureKind: EmbeddingFailureKind,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class ConversationNotFoundError extends RaglineError {
  readonly classification = 'manual' as const;
  readonly code = 'CONVERSATION_NOT_FOUND';

  constructor(
    public readonly conversationId: number,
    options?: ErrorOptions,
  ) {
    super(`Conversation ${conversationId} not found`, options);
  }
}

export class UserNotFoundError extends RaglineError {
  readonly classification = 'manual' as const;
  readonly code = 'USER_NOT_FOUND';

  constructor(
    public readonly username: string,
    options?: ErrorOptions,
  ) {
    super(`User "${username}" not found`, options);
  }
}

export class UnsupportedDocumentError extends RaglineError {
  readonly classification = 'manual' as const;
  readonly code = 'UNSUPPORTED_DOCUMENT';

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(`Unsupported document type: ${filePath}. Supported: .md, .markdown, .txt`, options);
  }
}
