/**
 * Memory system constants and types.
 * Follows src/governance/constants.ts pattern.
 */

export const MemoryOutcomes = ['success', 'neutral', 'failure'] as const;
export type MemoryOutcome = (typeof MemoryOutcomes)[number];

export const MemoryTiers = ['tactical', 'strategic'] as const;
export type MemoryTier = (typeof MemoryTiers)[number];
// tactical  = short memory, fades within two days
// strategic = long memory, stays influential for weeks

export const MemorySources = {
  INTERACTIVE: 'executive interaction',
  SECURITY_ACTION: 'automated security action',
} as const;

export const HALF_LIFE_HOURS: Record<MemoryTier, number> = {
  strategic: 720, // 30 days
  tactical: 48, // 2 days
};

export const DECAY_FLOOR = 0.1;

export const OUTCOME_SCORE: Record<MemoryOutcome, number> = {
  success: 1.0,
  neutral: 0.5,
  failure: 0.1,
};

// Substrings (lowercased) that mark an authoritative source.
export const AUTHORITATIVE_SOURCE_MARKERS = [
  'admin',
  'ceo',
  'executive',
  'automated security action',
];

export const STRATEGIC_MARKERS = ['vision', 'strategy', 'investor', 'plan'];
export const STRATEGIC_CONFIDENCE = 0.9;

/** In-memory shape of a stored record. `trust` is never stored. */
export interface MemoryRecord {
  id: string;
  content: string;
  created_at: string; // ISO-8601 UTC
  source: string;
  outcome: MemoryOutcome;
  confidence: number; // 0..1
  tier: MemoryTier;
  embedding: Float32Array | null;
}

/** SQLite row for `memories`. */
export interface MemoryRow {
  id: string;
  content: string;
  created_at: string;
  source: string;
  outcome: string;
  confidence: number;
  tier: string;
  embedding: Buffer | null;
  embedding_dims: number | null;
}

export interface ProcessedFileEntry {
  path: string;
  content_hash: string;
  updated_at: string;
}

export interface MemoryStats {
  total: number;
  average_confidence: number;
  strategic: number;
  tactical: number;
  processed_files: number;
  scars: number;
}
