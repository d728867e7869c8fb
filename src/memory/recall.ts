/**
 * Semantic recall. Ranks every stored memory by
 *
 *   score = 0.7 * cosine(query, memory) + 0.3 * trust(memory, now)
 *
 * so an apt-sounding but untrustworthy memory is pushed down. A memory
 * without a vector (or a query the embedder could not serve) contributes
 * similarity 0, which degrades the ranking to plain trust order.
 */
import { getAllMemories } from '../memory-db.js';
import { logger } from '../logger.js';
import type { Embedder } from '../types.js';
import type { MemoryTier } from './constants.js';
import { cosineSimilarity } from './embedding.js';
import { computeTrust } from './trust.js';

const SIMILARITY_WEIGHT = 0.7;
const TRUST_WEIGHT = 0.3;

export interface RecallOptions {
  embedder: Embedder;
  now?: Date;
}

export interface RecallResult {
  id: string;
  content: string;
  score: number;
  similarity: number;
  trust: number;
  tier: MemoryTier;
  created_at: string;
}

export async function retrieve(
  query: string,
  topK: number,
  options: RecallOptions,
): Promise<RecallResult[]> {
  if (topK <= 0) return [];

  const memories = getAllMemories();
  if (memories.length === 0) return [];

  const now = options.now ?? new Date();
  const embedded = await options.embedder.embed(query);
  const queryVec = embedded.ok ? embedded.value : null;
  if (!embedded.ok) {
    logger.warn(
      { reason: embedded.reason },
      'Query embedding unavailable, ranking by trust only',
    );
  }

  const scored = memories.map((mem): RecallResult => {
    const similarity =
      queryVec && mem.embedding ? cosineSimilarity(queryVec, mem.embedding) : 0;
    const trust = computeTrust(mem, now);
    return {
      id: mem.id,
      content: mem.content,
      score: SIMILARITY_WEIGHT * similarity + TRUST_WEIGHT * trust,
      similarity,
      trust,
      tier: mem.tier,
      created_at: mem.created_at,
    };
  });

  scored.sort(
    (a, b) => b.score - a.score || timestampOf(b.created_at) - timestampOf(a.created_at),
  );

  return scored.slice(0, topK);
}

function timestampOf(iso: string): number {
  const t = Date.parse(iso);
  return Number.isNaN(t) ? 0 : t;
}

/** Render recall results as prompt context, one memory per line. */
export function formatContext(results: RecallResult[]): string {
  return results
    .map(
      (r) =>
        `[${r.tier.toUpperCase()} MEMORY - Trust: ${r.trust.toFixed(2)}] ${r.content}`,
    )
    .join('\n');
}
