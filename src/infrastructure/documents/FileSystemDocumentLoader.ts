import fs from 'node:fs/promises';
import path from 'node:path';
import { createHash } from 'node:crypto';
import type { DocumentPort, LoadedDocument } from '../../domain/ports/DocumentPort.js';
import { UnsupportedDocumentError } from '../../domain/errors/DomainErrors.js';
import { MarkdownParser } from './MarkdownParser.js';

const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown']);
const TEXT_EXTENSIONS = new Set(['.txt']);

function isSupported(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return MARKDOWN_EXTENSIONS.has(ext) || TEXT_EXTENSIONS.has(ext);
}

export class FileSystemDocumentLoader implements DocumentPort {
  constructor(private readonly mdParser: MarkdownParser = new MarkdownParser()) {}

  async listFiles(targetPath: string): Promise<string[]> {
    const stat = await fs.stat(targetPath);
    if (stat.isFile()) return [targetPath];

    const results: string[] = [];
    await this.walkDir(targetPath, results);
    return results.sort();
  }

  /** 遞迴走訪目錄，收集支援的文件（跳過隱藏目錄） */
  private async walkDir(dir: string, results: string[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!entry.name.startsWith('.')) {
          await this.walkDir(fullPath, results);
        }
      } else if (entry.isFile() && isSupported(entry.name)) {
        results.push(fullPath);
      }
    }
  }

  async load(filePath: string, root: string): Promise<LoadedDocument> {
    if (!isSupported(filePath)) {
      throw new UnsupportedDocumentError(filePath);
    }

    const raw = await fs.readFile(filePath, 'utf-8');
    const source = path.relative(root, filePath).replace(/\\/g, '/');
    const contentHash = createHash('sha256').update(raw, 'utf-8').digest('hex');
    const ext = path.extname(filePath).toLowerCase();
    const basename = path.basename(filePath, path.extname(filePath));

    if (MARKDOWN_EXTENSIONS.has(ext)) {
      const parsed = this.mdParser.parse(raw);
      return { source, title: parsed.title ?? basename, text: parsed.body, contentHash };
    }

    return { source, title: basename, text: raw, contentHash };
  }
}
