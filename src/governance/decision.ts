/**
 * Decision ranking ("conqueror score").
 *
 *   score = impact^1.5 * certainty * reversibility
 *           / (risk * (1 + 2 * scars) * capital * time_cost * historical_penalty)
 *
 * Each recorded scar for an option adds twice the base risk weight.
 */
import { z } from 'zod';

import { countScarsMentioning } from '../scar-db.js';
import type { CollaboratorResult } from '../types.js';

export interface DecisionParams {
  impact: number;
  certainty: number;
  reversibility: number;
  risk: number;
  capital: number;
  timeCost: number;
  historicalPenalty: number;
  scarCount: number;
}

export interface DecisionOption extends Omit<DecisionParams, 'scarCount'> {
  name: string;
}

export interface RankedOption {
  name: string;
  score: number;
  scars: number;
  rank: number; // 1-based
  recommended: boolean;
}

/** Zero (or non-finite) denominators and non-finite results score 0. */
export function conquerorScore(p: DecisionParams): number {
  const adjustedRisk = p.risk * (1 + 2 * p.scarCount);
  const numerator = Math.pow(p.impact, 1.5) * p.certainty * p.reversibility;
  const denominator = adjustedRisk * p.capital * p.timeCost * p.historicalPenalty;

  if (denominator === 0 || !Number.isFinite(denominator)) return 0;
  const score = numerator / denominator;
  return Number.isFinite(score) ? score : 0;
}

/**
 * Rank options by score, highest first. Ties keep input order.
 * The top entry is the recommended choice.
 */
export function rankOptions(
  options: DecisionOption[],
  scarCounter: (name: string) => number = countScarsMentioning,
): RankedOption[] {
  const scored = options.map((opt) => {
    const scars = scarCounter(opt.name);
    return {
      name: opt.name,
      scars,
      score: conquerorScore({ ...opt, scarCount: scars }),
    };
  });

  // Array.prototype.sort is stable, so equal scores keep input order.
  scored.sort((a, b) => b.score - a.score);

  return scored.map((s, i) => ({ ...s, rank: i + 1, recommended: i === 0 }));
}

const DecisionOptionSchema = z
  .object({
    name: z.string().min(1),
    impact: z.number().default(5),
    certainty: z.number().default(0.5),
    reversibility: z.number().default(0.5),
    risk: z.number().default(5),
    capital: z.number().default(5),
    time: z.number().default(5),
    penalty: z.number().default(1.0),
  })
  .strict();

const DecisionOptionList = z.array(DecisionOptionSchema).min(1);

/**
 * Extract the option list from a model reply. Prose around the JSON is
 * tolerated; the array between the first `[` and the last `]` must validate.
 */
export function parseDecisionOptions(
  reply: string,
): CollaboratorResult<DecisionOption[]> {
  const start = reply.indexOf('[');
  const end = reply.lastIndexOf(']');
  if (start === -1 || end <= start) {
    return { ok: false, reason: 'malformed', detail: 'no JSON array in reply' };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(reply.slice(start, end + 1));
  } catch (err) {
    return {
      ok: false,
      reason: 'malformed',
      detail: err instanceof Error ? err.message : String(err),
    };
  }

  const parsed = DecisionOptionList.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: 'malformed', detail: parsed.error.message };
  }

  return {
    ok: true,
    value: parsed.data.map((o) => ({
      name: o.name,
      impact: o.impact,
      certainty: o.certainty,
      reversibility: o.reversibility,
      risk: o.risk,
      capital: o.capital,
      timeCost: o.time,
      historicalPenalty: o.penalty,
    })),
  };
}

export function formatRanking(ranking: RankedOption[]): string {
  const lines = ranking.map((r) => {
    const label = r.recommended ? 'WINNER' : `#${r.rank}`;
    return `${label}: ${r.name} | Conqueror Score: ${r.score.toFixed(2)} (Detected Scars: ${r.scars})`;
  });
  return ['STRATEGIC RANKING:', ...lines].join('\n');
}
