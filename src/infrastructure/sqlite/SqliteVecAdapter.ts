import type Database from 'better-sqlite3';
import { z } from 'zod';
import type {
  ChunkMetadata,
  VectorIndexPort,
  VectorMatch,
  VectorRecord,
} from '../../domain/ports/VectorIndexPort.js';

const metadataSchema = z.object({
  text: z.string(),
  source: z.string(),
  chunkIndex: z.number().int(),
  title: z.string().optional(),
});

function toBlob(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

/**
 * sqlite-vec 向量索引
 *
 * vec0 虛擬表只接受整數 rowid，因此字串 id 與 metadata 存在 vectors 表，
 * 以 vector_id 對應到 vectors_vec 的 rowid。
 *
 * 注意：sqlite-vec v0.1.x 的 PK 型別檢查要求 SQLite INTEGER，
 * better-sqlite3 的 JS number 會被綁為 REAL，需用 BigInt 才會綁為 INTEGER。
 */
export class SqliteVecAdapter implements VectorIndexPort {
  constructor(private readonly db: Database.Database) {}

  upsert(records: VectorRecord[]): void {
    const findStmt = this.db.prepare('SELECT vector_id FROM vectors WHERE record_id = ?');
    const updateStmt = this.db.prepare(
      'UPDATE vectors SET source = ?, metadata_json = ?, updated_at = ? WHERE vector_id = ?'
    );
    const insertStmt = this.db.prepare(
      'INSERT INTO vectors(record_id, source, metadata_json, updated_at) VALUES(?, ?, ?, ?)'
    );
    const deleteVecStmt = this.db.prepare('DELETE FROM vectors_vec WHERE rowid = ?');
    const insertVecStmt = this.db.prepare('INSERT INTO vectors_vec(rowid, embedding) VALUES(?, ?)');

    const write = this.db.transaction((rows: VectorRecord[]) => {
      const now = Date.now();
      for (const row of rows) {
        const metadataJson = JSON.stringify(row.metadata);
        const existing = findStmt.get(row.id) as { vector_id: number } | undefined;

        let vectorId: number;
        if (existing) {
          vectorId = existing.vector_id;
          updateStmt.run(row.metadata.source, metadataJson, now, vectorId);
          // vec0 不支援 REPLACE，先刪再插
          deleteVecStmt.run(BigInt(vectorId));
        } else {
          const result = insertStmt.run(row.id, row.metadata.source, metadataJson, now);
          vectorId = Number(result.lastInsertRowid);
        }
        insertVecStmt.run(BigInt(vectorId), toBlob(row.vector));
      }
    });

    write(records);
  }

  /** KNN 查詢，similarity = 1 / (1 + distance) */
  query(vector: Float32Array, topK: number): VectorMatch[] {
    const hits = this.db.prepare(`
      SELECT rowid AS vector_id, distance
      FROM vectors_vec
      WHERE embedding MATCH ?
        AND k = ?
      ORDER BY distance
    `).all(toBlob(vector), topK) as Array<{ vector_id: number | bigint; distance: number }>;

    const metaStmt = this.db.prepare(
      'SELECT record_id, metadata_json FROM vectors WHERE vector_id = ?'
    );

    const matches: VectorMatch[] = [];
    for (const hit of hits) {
      const row = metaStmt.get(Number(hit.vector_id)) as
        { record_id: string; metadata_json: string } | undefined;
      if (!row) continue;
      matches.push({
        id: row.record_id,
        score: 1.0 / (1.0 + hit.distance),
        metadata: this.parseMetadata(row.metadata_json),
      });
    }
    return matches;
  }

  deleteBySource(source: string): number {
    const rows = this.db.prepare(
      'SELECT vector_id FROM vectors WHERE source = ?'
    ).all(source) as Array<{ vector_id: number }>;

    const deleteVecStmt = this.db.prepare('DELETE FROM vectors_vec WHERE rowid = ?');
    const remove = this.db.transaction(() => {
      for (const { vector_id } of rows) {
        deleteVecStmt.run(BigInt(vector_id));
      }
      this.db.prepare('DELETE FROM vectors WHERE source = ?').run(source);
    });
    remove();

    return rows.length;
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS cnt FROM vectors').get() as { cnt: number };
    return row.cnt;
  }

  private parseMetadata(json: string): ChunkMetadata {
    return metadataSchema.parse(JSON.parse(json));
  }
}
