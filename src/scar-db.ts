/**
 * Scar ledger: lessons from failed decisions. Append-only: scars are
 * never updated or deleted.
 */
import crypto from 'node:crypto';
import type Database from 'better-sqlite3';
import { z } from 'zod';

import { withDb, withTransaction } from './db.js';
import { logger } from './logger.js';

export const VETO_SEVERITY = 0.8;

export interface ScarRecord {
  id: number;
  pattern_key: string; // SHA-256 of the lowercased triggering input
  severity: number; // 0..1
  lesson: string;
  created_at: string;
}

export interface TraumaMatch {
  severity: number;
  lesson: string;
}

export type RegisterScarResult =
  | { ok: true; id: number; duplicate: boolean }
  | { ok: false; error: string };

export function createScarSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS scars (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      pattern_key TEXT NOT NULL,
      severity REAL NOT NULL,
      lesson TEXT NOT NULL,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_scars_pattern ON scars(pattern_key);
  `);
}

export function patternKey(content: string): string {
  return crypto
    .createHash('sha256')
    .update(content.trim().toLowerCase())
    .digest('hex');
}

const ScarInput = z.object({
  content: z.string().refine((s) => s.trim().length > 0, 'content must not be empty'),
  severity: z.number().min(0).max(1),
  lesson: z.string().refine((s) => s.trim().length > 0, 'lesson must not be empty'),
});

/**
 * Record a lesson. Re-submitting the same input with the same lesson is
 * suppressed (returns the existing scar with duplicate=true).
 */
export function registerScar(
  content: string,
  severity: number,
  lesson: string,
): RegisterScarResult {
  const parsed = ScarInput.safeParse({ content, severity, lesson });
  if (!parsed.success) {
    return {
      ok: false,
      error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    };
  }

  const key = patternKey(content);
  const result = withTransaction((db) => {
    const existing = db
      .prepare('SELECT id FROM scars WHERE pattern_key = ? AND lesson = ?')
      .get(key, lesson) as { id: number } | undefined;
    if (existing) return { id: existing.id, duplicate: true };

    const info = db
      .prepare(
        `INSERT INTO scars (pattern_key, severity, lesson, created_at)
         VALUES (?, ?, ?, ?)`,
      )
      .run(key, severity, lesson, new Date().toISOString());
    return { id: Number(info.lastInsertRowid), duplicate: false };
  });

  if (!result.duplicate) {
    logger.info({ scarId: result.id, severity, lesson }, 'Lesson learned');
  }
  return { ok: true, ...result };
}

/** All scars, oldest first. */
export function getAllScars(): ScarRecord[] {
  return withDb(
    (db) =>
      db.prepare('SELECT * FROM scars ORDER BY id ASC').all() as ScarRecord[],
  );
}

/**
 * First scar (oldest first) sharing a lesson word with the input.
 * Cheap recall filter: any lesson word found in the lowercased input counts,
 * whatever its length. Over-triggering is preferred to missing a lesson.
 */
export function checkTrauma(inputText: string): TraumaMatch | null {
  const input = inputText.toLowerCase();
  if (!input.trim()) return null;

  for (const scar of getAllScars()) {
    const words = scar.lesson.toLowerCase().split(/\s+/).filter(Boolean);
    if (words.some((w) => input.includes(w))) {
      return { severity: scar.severity, lesson: scar.lesson };
    }
  }
  return null;
}

/** Number of scars whose lesson mentions `name` (case-insensitive). */
export function countScarsMentioning(name: string): number {
  const needle = name.trim().toLowerCase();
  if (!needle) return 0;
  return getAllScars().filter((s) => s.lesson.toLowerCase().includes(needle))
    .length;
}
