import type { Chunk } from '../../domain/entities/Chunk.js';

export interface TextSplitterOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  separator?: string;
}

/**
 * 字元切塊：先以 separator 切段，再貪婪合併到 chunkSize 以內，
 * 相鄰 chunk 之間保留不超過 chunkOverlap 字元的尾段作為重疊。
 * 單一段落超過 chunkSize 時自成一塊，不再細切。
 */
export class TextSplitter {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly separator: string;

  constructor(options: TextSplitterOptions = {}) {
    this.chunkSize = options.chunkSize ?? 1000;
    this.chunkOverlap = options.chunkOverlap ?? 200;
    this.separator = options.separator ?? '\n\n';

    if (this.chunkOverlap >= this.chunkSize) {
      throw new Error('chunkOverlap must be smaller than chunkSize');
    }
  }

  splitText(text: string): string[] {
    const pieces = (this.separator ? text.split(this.separator) : [...text])
      .filter((piece) => piece !== '');
    return this.mergePieces(pieces);
  }

  split(source: string, text: string): Chunk[] {
    return this.splitText(text).map((chunkText, chunkIndex) => ({
      source,
      chunkIndex,
      text: chunkText,
      // token 估算：1 token ≈ 4 chars
      tokenEstimate: Math.ceil(chunkText.length / 4),
    }));
  }

  private mergePieces(pieces: string[]): string[] {
    const sepLen = this.separator.length;
    const chunks: string[] = [];
    const current: string[] = [];
    let total = 0;

    const joinedLength = (extra: number): number =>
      total + extra + (current.length > 0 ? sepLen : 0);

    const emit = (): void => {
      const chunk = current.join(this.separator).trim();
      if (chunk) chunks.push(chunk);
    };

    for (const piece of pieces) {
      if (joinedLength(piece.length) > this.chunkSize && current.length > 0) {
        emit();
        // 從前端丟棄，直到剩餘長度落在 overlap 內且放得下新段落
        while (
          total > this.chunkOverlap
          || (total > 0 && joinedLength(piece.length) > this.chunkSize)
        ) {
          const dropped = current.shift();
          if (dropped === undefined) break;
          total -= dropped.length + (current.length > 0 ? sepLen : 0);
        }
      }
      current.push(piece);
      total += piece.length + (current.length > 1 ? sepLen : 0);
    }

    emit();
    return chunks;
  }
}
