/**
 * Trust scoring. Recomputed per query from the record's age; never stored.
 *
 *   trust = 0.5 * outcome + 0.3 * decay + 0.2 * source_credibility
 */
import {
  AUTHORITATIVE_SOURCE_MARKERS,
  DECAY_FLOOR,
  HALF_LIFE_HOURS,
  OUTCOME_SCORE,
  type MemoryRecord,
  type MemoryTier,
} from './constants.js';

const MS_PER_HOUR = 3_600_000;

export type TrustInput = Pick<
  MemoryRecord,
  'outcome' | 'created_at' | 'tier' | 'source'
>;

export function halfLifeHours(tier: MemoryTier): number {
  return HALF_LIFE_HOURS[tier];
}

/**
 * Hours between `createdAt` and `now`. A missing or unparseable timestamp
 * counts as brand new (0 hours).
 */
export function ageHours(createdAt: string | null | undefined, now: Date): number {
  if (!createdAt) return 0;
  const created = Date.parse(createdAt);
  if (Number.isNaN(created)) return 0;
  return (now.getTime() - created) / MS_PER_HOUR;
}

/** Linear decay over the tier's half-life, clamped to [0.1, 1.0]. */
export function decayFactor(
  createdAt: string | null | undefined,
  tier: MemoryTier,
  now: Date,
): number {
  const decay = 1.0 - ageHours(createdAt, now) / halfLifeHours(tier);
  return Math.min(1.0, Math.max(DECAY_FLOOR, decay));
}

export function sourceCredibility(source: string): number {
  const s = source.toLowerCase();
  return AUTHORITATIVE_SOURCE_MARKERS.some((m) => s.includes(m)) ? 1.0 : 0.6;
}

export function computeTrust(record: TrustInput, now: Date = new Date()): number {
  const outcome = OUTCOME_SCORE[record.outcome] ?? OUTCOME_SCORE.neutral;
  const decay = decayFactor(record.created_at, record.tier, now);
  const source = sourceCredibility(record.source);

  const trust = 0.5 * outcome + 0.3 * decay + 0.2 * source;
  return Math.round(trust * 100) / 100;
}
