/**
 * Memory storage: schema, append, listing, keyword deletion, delta-sync cursor.
 * Follows src/scar-db.ts pattern: createMemorySchema() called from db.ts,
 * every call opens its own connection through withDb/withTransaction.
 */
import crypto from 'node:crypto';
import type Database from 'better-sqlite3';
import { z } from 'zod';

import { withDb, withTransaction } from './db.js';
import { logger } from './logger.js';
import {
  MemoryOutcomes,
  MemoryTiers,
  type MemoryOutcome,
  type MemoryRecord,
  type MemoryRow,
  type MemoryStats,
  type MemoryTier,
  type ProcessedFileEntry,
} from './memory/constants.js';
import { bufferToEmbedding, embeddingToBuffer } from './memory/embedding.js';

export function createMemorySchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS memories (
      id TEXT PRIMARY KEY,
      content TEXT NOT NULL,
      created_at TEXT NOT NULL,
      source TEXT NOT NULL,
      outcome TEXT NOT NULL DEFAULT 'neutral',
      confidence REAL NOT NULL,
      tier TEXT NOT NULL DEFAULT 'tactical',
      embedding BLOB,
      embedding_dims INTEGER
    );
    CREATE INDEX IF NOT EXISTS idx_memories_created ON memories(created_at);
    CREATE INDEX IF NOT EXISTS idx_memories_tier ON memories(tier);

    CREATE TABLE IF NOT EXISTS processed_files (
      path TEXT PRIMARY KEY,
      content_hash TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);
}

// --- Memories ---

export type NewMemory = Omit<MemoryRecord, 'id' | 'created_at'> & {
  id?: string;
  created_at?: string;
};

export type AppendResult =
  | { ok: true; id: string }
  | { ok: false; error: string };

const NewMemorySchema = z.object({
  content: z
    .string()
    .refine((s) => s.trim().length > 0, 'content must not be empty'),
  source: z.string().min(1, 'source must not be empty'),
  outcome: z.enum(MemoryOutcomes),
  confidence: z.number().min(0).max(1),
  tier: z.enum(MemoryTiers),
});

/**
 * Append a memory. Malformed input is rejected before anything is written;
 * the insert is a single statement inside a transaction, so readers see
 * either the whole row or nothing.
 */
export function appendMemory(memory: NewMemory): AppendResult {
  const parsed = NewMemorySchema.safeParse(memory);
  if (!parsed.success) {
    return {
      ok: false,
      error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    };
  }

  const id = memory.id ?? crypto.randomUUID();
  const createdAt = memory.created_at ?? new Date().toISOString();

  withTransaction((db) => {
    db.prepare(
      `INSERT INTO memories
         (id, content, created_at, source, outcome, confidence, tier, embedding, embedding_dims)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      id,
      memory.content,
      createdAt,
      memory.source,
      memory.outcome,
      memory.confidence,
      memory.tier,
      memory.embedding ? embeddingToBuffer(memory.embedding) : null,
      memory.embedding ? memory.embedding.length : null,
    );
  });

  return { ok: true, id };
}

/** All memories, newest first. */
export function getAllMemories(): MemoryRecord[] {
  const rows = withDb(
    (db) =>
      db
        .prepare('SELECT * FROM memories ORDER BY created_at DESC')
        .all() as MemoryRow[],
  );
  return rows.map(rowToMemory);
}

export function getMemoryById(id: string): MemoryRecord | undefined {
  const row = withDb(
    (db) =>
      db.prepare('SELECT * FROM memories WHERE id = ?').get(id) as
        | MemoryRow
        | undefined,
  );
  return row ? rowToMemory(row) : undefined;
}

/**
 * Delete every memory whose content contains `keyword` (case-insensitive).
 * Matching runs in JS so non-ASCII text folds correctly and `%`/`_` are literal.
 * An empty keyword deletes nothing.
 */
export function deleteMemoriesMatching(keyword: string): number {
  const needle = keyword.trim().toLowerCase();
  if (!needle) return 0;

  return withTransaction((db) => {
    const rows = db.prepare('SELECT id, content FROM memories').all() as Array<
      Pick<MemoryRow, 'id' | 'content'>
    >;
    const del = db.prepare('DELETE FROM memories WHERE id = ?');
    let removed = 0;
    for (const row of rows) {
      if (row.content.toLowerCase().includes(needle)) {
        removed += del.run(row.id).changes;
      }
    }
    return removed;
  });
}

export function getMemoryStats(): MemoryStats {
  return withDb((db) => {
    const mem = db
      .prepare(
        `SELECT COUNT(*) AS total,
                AVG(confidence) AS avg_confidence,
                SUM(CASE WHEN tier = 'strategic' THEN 1 ELSE 0 END) AS strategic
         FROM memories`,
      )
      .get() as { total: number; avg_confidence: number | null; strategic: number | null };
    const files = db
      .prepare('SELECT COUNT(*) AS cnt FROM processed_files')
      .get() as { cnt: number };
    const scars = db.prepare('SELECT COUNT(*) AS cnt FROM scars').get() as {
      cnt: number;
    };

    const strategic = mem.strategic ?? 0;
    return {
      total: mem.total,
      average_confidence: Math.round((mem.avg_confidence ?? 0) * 100) / 100,
      strategic,
      tactical: mem.total - strategic,
      processed_files: files.cnt,
      scars: scars.cnt,
    };
  });
}

function rowToMemory(row: MemoryRow): MemoryRecord {
  return {
    id: row.id,
    content: row.content,
    created_at: row.created_at,
    source: row.source,
    outcome: isOutcome(row.outcome) ? row.outcome : 'neutral',
    confidence: row.confidence,
    tier: isTier(row.tier) ? row.tier : 'tactical',
    embedding: readEmbedding(row),
  };
}

// A vector whose length disagrees with its recorded dimension is unusable
// for cosine scoring; the memory is kept and ranked by trust alone.
function readEmbedding(row: MemoryRow): Float32Array | null {
  if (!row.embedding) return null;
  const vec = bufferToEmbedding(row.embedding);
  if (row.embedding_dims !== null && row.embedding_dims !== vec.length) {
    logger.warn(
      { id: row.id, expected: row.embedding_dims, actual: vec.length },
      'Stored embedding has the wrong dimension, ignoring it',
    );
    return null;
  }
  return vec;
}

function isOutcome(value: string): value is MemoryOutcome {
  return (MemoryOutcomes as readonly string[]).includes(value);
}

function isTier(value: string): value is MemoryTier {
  return (MemoryTiers as readonly string[]).includes(value);
}

// --- Delta-sync cursor ---

export function getProcessedFile(
  filePath: string,
): ProcessedFileEntry | undefined {
  return withDb(
    (db) =>
      db.prepare('SELECT * FROM processed_files WHERE path = ?').get(filePath) as
        | ProcessedFileEntry
        | undefined,
  );
}

/** Insert or overwrite the digest for a path (last writer wins). */
export function upsertProcessedFile(filePath: string, contentHash: string): void {
  withTransaction((db) => {
    db.prepare(
      `INSERT INTO processed_files (path, content_hash, updated_at)
       VALUES (?, ?, ?)
       ON CONFLICT(path) DO UPDATE SET
         content_hash = excluded.content_hash,
         updated_at = excluded.updated_at`,
    ).run(filePath, contentHash, new Date().toISOString());
  });
}

export function countProcessedFiles(): number {
  const row = withDb(
    (db) =>
      db.prepare('SELECT COUNT(*) AS cnt FROM processed_files').get() as {
        cnt: number;
      },
  );
  return row.cnt;
}
