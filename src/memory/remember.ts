/**
 * Memory ingestion: tier once, embed once, append.
 */
import { appendMemory, type AppendResult } from '../memory-db.js';
import { logger } from '../logger.js';
import type { Embedder } from '../types.js';
import type { MemoryOutcome } from './constants.js';
import { classifyTier } from './classifier.js';

export interface Observation {
  content: string;
  source: string;
  outcome?: MemoryOutcome;
  confidence?: number;
  /** Override for imports/tests; defaults to now. */
  created_at?: string;
}

export async function rememberObservation(
  obs: Observation,
  embedder: Embedder,
): Promise<AppendResult> {
  if (!obs.content || obs.content.trim().length === 0) {
    return { ok: false, error: 'content: content must not be empty' };
  }

  const confidence = obs.confidence ?? 0.5;
  const tier = classifyTier(obs.content, confidence);

  const embedded = await embedder.embed(obs.content);
  if (!embedded.ok) {
    logger.warn(
      { reason: embedded.reason },
      'Storing memory without embedding',
    );
  }

  const result = appendMemory({
    content: obs.content,
    source: obs.source,
    outcome: obs.outcome ?? 'neutral',
    confidence,
    tier,
    embedding: embedded.ok ? embedded.value : null,
    created_at: obs.created_at,
  });

  if (result.ok) {
    logger.debug({ id: result.id, tier }, 'Memory stored');
  } else {
    logger.warn({ error: result.error }, 'Memory rejected');
  }
  return result;
}
