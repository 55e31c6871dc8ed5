import type { z } from 'zod';
import type { AskResponse } from '../../application/dto/AskResponse.js';
import type { outputFormatSchema } from '../options.js';

export type OutputFormat = z.infer<typeof outputFormatSchema>;

/**
 * CLI 輸出格式化器
 *
 * - json：原樣輸出，供腳本串接
 * - text：人類可讀格式
 */
export class OutputFormatter {
  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  formatAnswer(response: AskResponse, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(response, null, 2);
    }

    const lines = [response.answer, ''];
    if (response.sources.length > 0) {
      lines.push('Sources:');
      response.sources.forEach((s, i) => {
        lines.push(`  [${i + 1}] ${s.id} (score: ${s.score.toFixed(4)})`);
      });
      lines.push('');
    }
    lines.push(`Conversation: ${response.conversationId} (user: ${response.username})`);
    return lines.join('\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      if (data.length === 0) return `${prefix}(none)`;
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1).trimStart()}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
