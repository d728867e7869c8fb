/**
 * Retention tier classification.
 * Evaluated once when a memory is created; later feedback never re-tiers it.
 */
import {
  STRATEGIC_CONFIDENCE,
  STRATEGIC_MARKERS,
  type MemoryTier,
} from './constants.js';

export interface TierClassification {
  tier: MemoryTier;
  reason: string;
}

/**
 * Rules (in priority order):
 * 1. confidence >= 0.9 → strategic
 * 2. content mentions a long-horizon marker → strategic
 * 3. otherwise → tactical
 */
export function classifyTierWithReason(
  content: string,
  confidence: number,
): TierClassification {
  if (confidence >= STRATEGIC_CONFIDENCE) {
    return { tier: 'strategic', reason: `confidence ${confidence} >= ${STRATEGIC_CONFIDENCE}` };
  }

  const lower = content.toLowerCase();
  const marker = STRATEGIC_MARKERS.find((m) => lower.includes(m));
  if (marker) {
    return { tier: 'strategic', reason: `long-horizon marker: ${marker}` };
  }

  return { tier: 'tactical', reason: 'default short-horizon tier' };
}

export function classifyTier(content: string, confidence: number): MemoryTier {
  return classifyTierWithReason(content, confidence).tier;
}
