import type Database from 'better-sqlite3';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { LLMPort } from '../domain/ports/LLMPort.js';

export interface HealthCheckOptions {
  fix?: boolean;
  /** 實際呼叫 embedding 與 chat 服務確認可用性 */
  checkServices?: boolean;
}

export interface SourceMismatch {
  source: string;
  expectedChunks: number;
  actualVectors: number;
}

export interface ServiceStatus {
  embedding: boolean;
  llm: boolean;
}

export interface HealthReport {
  healthy: boolean;
  totalSources: number;
  totalVectors: number;
  totalConversations: number;
  orphanedVectorIds: string[];
  sourceMismatches: SourceMismatch[];
  services?: ServiceStatus;
  fixActions: string[];
}

export interface HealthCheckServices {
  embedding?: EmbeddingPort;
  llm?: LLMPort;
}

/**
 * 健康檢查用例：驗證索引一致性，可選修復模式
 *
 * 檢查項目：
 * 1. orphaned vectors：vectors 表中沒有對應 vectors_vec row 的紀錄
 * 2. sources.chunk_count 與實際向量數是否一致
 *
 * 修復項目（fix=true）：刪除 orphaned vectors 的 metadata
 */
export class HealthCheckUseCase {
  constructor(
    private readonly db: Database.Database,
    private readonly services: HealthCheckServices = {},
  ) {}

  async check(options: HealthCheckOptions = {}): Promise<HealthReport> {
    const fixActions: string[] = [];

    const totalSources = this.countRows('sources');
    const totalConversations = this.countRows('conversations');

    const orphans = this.findOrphanedVectors();

    if (options.fix && orphans.length > 0) {
      const stmt = this.db.prepare('DELETE FROM vectors WHERE vector_id = ?');
      const remove = this.db.transaction(() => {
        for (const { vector_id } of orphans) stmt.run(vector_id);
      });
      remove();
      fixActions.push(`Deleted ${orphans.length} orphaned vectors`);
    }

    // 修復後才計算，讓數量反映目前狀態
    const totalVectors = this.countRows('vectors');
    const sourceMismatches = this.findSourceMismatches();

    const report: HealthReport = {
      healthy: orphans.length === 0 && sourceMismatches.length === 0,
      totalSources,
      totalVectors,
      totalConversations,
      orphanedVectorIds: orphans.map((o) => o.record_id),
      sourceMismatches,
      fixActions,
    };

    if (options.checkServices) {
      report.services = {
        embedding: this.services.embedding ? await this.services.embedding.isHealthy() : false,
        llm: this.services.llm ? await this.services.llm.isAvailable() : false,
      };
    }

    return report;
  }

  private countRows(table: 'sources' | 'vectors' | 'conversations'): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS cnt FROM ${table}`).get() as { cnt: number };
    return row.cnt;
  }

  /** vec0 rowid 需以 BigInt 綁定，逐筆查詢 */
  private findOrphanedVectors(): Array<{ vector_id: number; record_id: string }> {
    const rows = this.db.prepare(
      'SELECT vector_id, record_id FROM vectors ORDER BY vector_id',
    ).all() as Array<{ vector_id: number; record_id: string }>;

    const vecStmt = this.db.prepare('SELECT rowid FROM vectors_vec WHERE rowid = ?');
    return rows.filter((r) => vecStmt.get(BigInt(r.vector_id)) === undefined);
  }

  private findSourceMismatches(): SourceMismatch[] {
    const rows = this.db.prepare(`
      SELECT s.source_path, s.chunk_count, COUNT(v.vector_id) AS actual
      FROM sources s
      LEFT JOIN vectors v ON v.source = s.source_path
      GROUP BY s.source_id
      ORDER BY s.source_path
    `).all() as Array<{ source_path: string; chunk_count: number; actual: number }>;

    return rows
      .filter((r) => r.chunk_count !== r.actual)
      .map((r) => ({ source: r.source_path, expectedChunks: r.chunk_count, actualVectors: r.actual }));
  }
}
