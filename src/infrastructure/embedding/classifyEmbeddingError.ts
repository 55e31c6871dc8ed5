import {
  EmbeddingPayloadTooLargeError,
  EmbeddingRateLimitError,
  type EmbeddingFailureKind,
} from '../../domain/errors/DomainErrors.js';

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * 判斷 embedding 失敗的種類
 *
 * 優先使用結構化資訊（domain 錯誤類別、HTTP status），
 * 其餘才退回到錯誤訊息的字串比對。
 */
export function classifyEmbeddingError(err: unknown): EmbeddingFailureKind {
  if (err instanceof EmbeddingRateLimitError) return 'rate_limit';
  if (err instanceof EmbeddingPayloadTooLargeError) return 'payload_too_large';

  const status = statusOf(err);
  if (status === 429) return 'rate_limit';
  if (status === 413) return 'payload_too_large';

  const message = messageOf(err).toLowerCase();
  if (message.includes('rate_limit') || message.includes('rate limit') || message.includes('429')) {
    return 'rate_limit';
  }
  if (message.includes('too many tokens')) {
    return 'payload_too_large';
  }
  return 'transient';
}
