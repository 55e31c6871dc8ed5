import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { SqliteVecAdapter } from '../../src/infrastructure/sqlite/SqliteVecAdapter.js';
import type { VectorRecord } from '../../src/domain/ports/VectorIndexPort.js';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

function record(id: string, source: string, vector: number[], text: string): VectorRecord {
  const chunkIndex = Number(id.split('#')[1]);
  return { id, vector: new Float32Array(vector), metadata: { text, source, chunkIndex, title: source } };
}

describe('SqliteVecAdapter', () => {
  let mgr: DatabaseManager;
  let adapter: SqliteVecAdapter;
  const dim = 4; // 測試用小維度
  const tmpDir = path.join(os.tmpdir(), 'ragline-vec-' + Date.now());

  beforeEach(() => {
    fs.mkdirSync(tmpDir, { recursive: true });
    mgr = new DatabaseManager(path.join(tmpDir, 'test.db'), dim);
    adapter = new SqliteVecAdapter(mgr.getDb());

    adapter.upsert([
      record('a.md#0', 'a.md', [1, 0, 0, 0], 'alpha zero'),
      record('b.md#0', 'b.md', [0, 1, 0, 0], 'beta zero'),
      record('a.md#1', 'a.md', [0.9, 0.1, 0, 0], 'alpha one'), // 最接近 a.md#0
    ]);
  });

  afterEach(() => {
    mgr.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should return nearest neighbours with their metadata', () => {
    const matches = adapter.query(new Float32Array([1, 0, 0, 0]), 2);

    expect(matches.map((m) => m.id)).toEqual(['a.md#0', 'a.md#1']);
    // 距離 0 → 相似度 1
    expect(matches[0].score).toBe(1);
    expect(matches[1].score).toBeLessThan(1);
    expect(matches[0].metadata).toEqual({ text: 'alpha zero', source: 'a.md', chunkIndex: 0, title: 'a.md' });
  });

  it('should replace an existing record on upsert', () => {
    adapter.upsert([record('a.md#0', 'a.md', [0, 0, 1, 0], 'updated')]);

    expect(adapter.count()).toBe(3);
    const [match] = adapter.query(new Float32Array([0, 0, 1, 0]), 1);
    expect(match.id).toBe('a.md#0');
    expect(match.metadata.text).toBe('updated');
  });

  it('should delete every record of a source', () => {
    expect(adapter.deleteBySource('a.md')).toBe(2);
    expect(adapter.count()).toBe(1);

    const matches = adapter.query(new Float32Array([1, 0, 0, 0]), 3);
    expect(matches.map((m) => m.id)).toEqual(['b.md#0']);
  });

  it('should return 0 when deleting an unknown source', () => {
    expect(adapter.deleteBySource('missing.md')).toBe(0);
    expect(adapter.count()).toBe(3);
  });
});
