export const SCHEMA_VERSION = 1;

/** 連線層級設定，開啟資料庫後依序套用 */
export const PRAGMAS = [
  'journal_mode = WAL',
  'busy_timeout = 5000',
  'synchronous = NORMAL',
  'foreign_keys = ON',
] as const;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sources (
  source_id INTEGER PRIMARY KEY,
  source_path TEXT NOT NULL UNIQUE,
  title TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  chunk_count INTEGER NOT NULL,
  ingested_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS vectors (
  vector_id INTEGER PRIMARY KEY,
  record_id TEXT NOT NULL UNIQUE,
  source TEXT NOT NULL,
  metadata_json TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS users (
  user_id INTEGER PRIMARY KEY,
  username TEXT NOT NULL UNIQUE,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS conversations (
  conversation_id INTEGER PRIMARY KEY,
  user_id INTEGER NOT NULL,
  title TEXT,
  created_at INTEGER NOT NULL,
  FOREIGN KEY(user_id) REFERENCES users(user_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS messages (
  message_id INTEGER PRIMARY KEY,
  conversation_id INTEGER NOT NULL,
  role TEXT NOT NULL CHECK(role IN ('user','assistant')),
  content TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  FOREIGN KEY(conversation_id) REFERENCES conversations(conversation_id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_vectors_source ON vectors(source);
CREATE INDEX IF NOT EXISTS idx_conversations_user_id ON conversations(user_id);
CREATE INDEX IF NOT EXISTS idx_messages_conversation_id ON messages(conversation_id);
`;

/**
 * sqlite-vec 的 vec0 虛擬表需要在 extension 載入後才能建立
 * dimension 由設定決定
 */
export function vecTableSQL(dimension: number): string {
  return `CREATE VIRTUAL TABLE IF NOT EXISTS vectors_vec USING vec0(embedding float[${dimension}]);`;
}
