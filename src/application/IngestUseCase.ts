import path from 'node:path';
import type Database from 'better-sqlite3';
import type { DocumentPort, LoadedDocument } from '../domain/ports/DocumentPort.js';
import type { VectorIndexPort, VectorRecord } from '../domain/ports/VectorIndexPort.js';
import type { Chunk } from '../domain/entities/Chunk.js';
import { chunkRecordId } from '../domain/entities/Chunk.js';
import type { Source } from '../domain/entities/Source.js';
import type { EmbeddingBatcher } from '../infrastructure/embedding/EmbeddingBatcher.js';
import type { TextSplitter } from '../infrastructure/documents/TextSplitter.js';
import type { IngestStats } from './dto/IngestStats.js';
import { Logger } from '../shared/Logger.js';

export interface IngestOptions {
  /** source 路徑的相對基準 */
  root: string;
  /** 即使內容未變也重新匯入 */
  force?: boolean;
}

export interface IngestUseCaseOptions {
  upsertBatchSize?: number;
  logger?: Logger;
}

interface PendingDocument {
  doc: LoadedDocument;
  chunks: Chunk[];
}

interface SourceRow {
  source_id: number;
  source_path: string;
  title: string;
  content_hash: string;
  chunk_count: number;
  ingested_at: number;
}

/**
 * 匯入用例：載入文件 → 切塊 → 批次 embedding → 寫入向量索引
 *
 * 所有新 chunk 透過單次 EmbeddingBatcher.embedBatch 完成；
 * 若 pipeline 失敗則整次匯入中止，索引不會寫入任何資料。
 */
export class IngestUseCase {
  private readonly upsertBatchSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    private readonly documents: DocumentPort,
    private readonly splitter: TextSplitter,
    private readonly batcher: EmbeddingBatcher,
    private readonly index: VectorIndexPort,
    options: IngestUseCaseOptions = {},
  ) {
    this.upsertBatchSize = options.upsertBatchSize ?? 100;
    this.logger = options.logger ?? new Logger('IngestUseCase');
  }

  async ingest(paths: string[], options: IngestOptions): Promise<IngestStats> {
    const start = Date.now();
    const stats: IngestStats = {
      filesProcessed: 0, filesSkipped: 0,
      chunksCreated: 0, vectorsUpserted: 0,
      upsertBatches: 0, durationMs: 0,
    };

    const root = path.resolve(options.root);
    // 重疊的路徑（目錄與其中的檔案）只處理一次
    const files = new Set<string>();
    for (const target of paths) {
      for (const file of await this.documents.listFiles(path.resolve(root, target))) {
        files.add(path.resolve(file));
      }
    }

    // 載入並切塊，跳過內容未變的文件
    const pending: PendingDocument[] = [];
    for (const filePath of files) {
      const doc = await this.documents.load(filePath, root);
      const existing = this.getSource(doc.source);
      if (!options.force && existing?.contentHash === doc.contentHash) {
        stats.filesSkipped++;
        continue;
      }
      const chunks = this.splitter.split(doc.source, doc.text);
      pending.push({ doc, chunks });
      stats.chunksCreated += chunks.length;
    }

    const texts = pending.flatMap((p) => p.chunks.map((c) => c.text));
    this.logger.info('Creating embeddings', { files: pending.length, chunks: texts.length });
    const embeddings = await this.batcher.embedBatch(texts);

    let offset = 0;
    for (const { doc, chunks } of pending) {
      const records: VectorRecord[] = chunks.map((chunk, i) => ({
        id: chunkRecordId(doc.source, chunk.chunkIndex),
        vector: embeddings[offset + i].vector,
        metadata: {
          text: chunk.text,
          source: doc.source,
          chunkIndex: chunk.chunkIndex,
          title: doc.title,
        },
      }));
      offset += chunks.length;

      const upsertBatches = this.replaceSource(doc, records);
      stats.upsertBatches += upsertBatches;
      stats.vectorsUpserted += records.length;
      stats.filesProcessed++;
      this.logger.info('Source ingested', { source: doc.source, chunks: chunks.length });
    }

    stats.durationMs = Date.now() - start;
    return stats;
  }

  /** 單一 transaction 內替換來源的向量與 sources row，失敗時保留舊資料 */
  private replaceSource(doc: LoadedDocument, records: VectorRecord[]): number {
    const replace = this.db.transaction(() => {
      this.index.deleteBySource(doc.source);
      let batches = 0;
      for (let i = 0; i < records.length; i += this.upsertBatchSize) {
        this.index.upsert(records.slice(i, i + this.upsertBatchSize));
        batches++;
      }
      this.saveSource(doc, records.length);
      return batches;
    });
    return replace();
  }

  listSources(): Source[] {
    const rows = this.db.prepare(
      `SELECT source_id, source_path, title, content_hash, chunk_count, ingested_at
       FROM sources ORDER BY source_path`,
    ).all() as SourceRow[];
    return rows.map((r) => this.toSource(r));
  }

  getSource(sourcePath: string): Source | undefined {
    const row = this.db.prepare(
      `SELECT source_id, source_path, title, content_hash, chunk_count, ingested_at
       FROM sources WHERE source_path = ?`,
    ).get(sourcePath) as SourceRow | undefined;
    return row ? this.toSource(row) : undefined;
  }

  /** 移除來源及其所有向量 */
  removeSource(sourcePath: string): boolean {
    this.index.deleteBySource(sourcePath);
    const result = this.db.prepare('DELETE FROM sources WHERE source_path = ?').run(sourcePath);
    return result.changes > 0;
  }

  private saveSource(doc: LoadedDocument, chunkCount: number): void {
    this.db.prepare(`
      INSERT INTO sources (source_path, title, content_hash, chunk_count, ingested_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(source_path) DO UPDATE SET
        title = excluded.title,
        content_hash = excluded.content_hash,
        chunk_count = excluded.chunk_count,
        ingested_at = excluded.ingested_at
    `).run(doc.source, doc.title, doc.contentHash, chunkCount, Date.now());
  }

  private toSource(r: SourceRow): Source {
    return {
      sourceId: r.source_id,
      sourcePath: r.source_path,
      title: r.title,
      contentHash: r.content_hash,
      chunkCount: r.chunk_count,
      ingestedAt: r.ingested_at,
    };
  }
}
