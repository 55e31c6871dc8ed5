import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { PRAGMAS, SCHEMA_SQL, SCHEMA_VERSION, vecTableSQL } from './schema.js';
import { Logger } from '../../shared/Logger.js';

const IN_MEMORY = ':memory:';

/**
 * SQLite 連線與 schema 管理
 *
 * 開啟時載入 sqlite-vec、建立資料表，並把 embedding 維度寫進 schema_meta。
 * vec0 表的維度在建立後即固定，換模型時必須重建資料庫。
 */
export class DatabaseManager {
  private readonly db: Database.Database;
  private readonly logger = new Logger('DatabaseManager');

  constructor(
    dbPath: string,
    private readonly embeddingDimension: number = 1024,
  ) {
    if (dbPath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    try {
      this.initialize();
    } catch (err) {
      this.db.close();
      throw err;
    }

    this.logger.debug('Database initialized', { dbPath, embeddingDimension });
  }

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }

  private initialize(): void {
    this.db.loadExtension(sqliteVec.getLoadablePath());
    for (const pragma of PRAGMAS) {
      this.db.pragma(pragma);
    }

    this.db.exec(SCHEMA_SQL);
    this.db.exec(vecTableSQL(this.embeddingDimension));
    this.writeMeta('version', String(SCHEMA_VERSION));

    const stored = this.readMeta('embedding_dimension');
    if (stored === undefined) {
      this.writeMeta('embedding_dimension', String(this.embeddingDimension));
    } else if (Number(stored) !== this.embeddingDimension) {
      throw new Error(
        `Embedding dimension mismatch: database has ${stored}, config specifies ${this.embeddingDimension}. ` +
        'Delete the database file and run "ragline ingest" again to rebuild the vector index.'
      );
    }
  }

  private readMeta(key: string): string | undefined {
    const row = this.db.prepare('SELECT value FROM schema_meta WHERE key = ?').get(key) as
      { value: string } | undefined;
    return row?.value;
  }

  private writeMeta(key: string, value: string): void {
    this.db.prepare('INSERT OR REPLACE INTO schema_meta(key, value) VALUES(?, ?)').run(key, value);
  }
}
