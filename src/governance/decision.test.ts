import { describe, it, expect } from 'vitest';
import {
  conquerorScore,
  formatRanking,
  parseDecisionOptions,
  rankOptions,
  type DecisionOption,
  type DecisionParams,
} from './decision.js';

const base: DecisionParams = {
  impact: 4,
  certainty: 1,
  reversibility: 1,
  risk: 1,
  capital: 1,
  timeCost: 1,
  historicalPenalty: 1,
  scarCount: 0,
};

function option(name: string, overrides: Partial<DecisionOption> = {}): DecisionOption {
  return {
    name,
    impact: base.impact,
    certainty: base.certainty,
    reversibility: base.reversibility,
    risk: base.risk,
    capital: base.capital,
    timeCost: base.timeCost,
    historicalPenalty: base.historicalPenalty,
    ...overrides,
  };
}

describe('conquerorScore', () => {
  it('computes impact^1.5 * certainty * reversibility over the cost product', () => {
    // 4^1.5 = 8
    expect(conquerorScore(base)).toBeCloseTo(8, 10);
    // 8 * 0.5 * 0.5 / (2 * 1 * 2 * 1 * 1) = 0.5
    expect(
      conquerorScore({ ...base, certainty: 0.5, reversibility: 0.5, risk: 2, timeCost: 2 }),
    ).toBeCloseTo(0.5, 10);
  });

  it('each scar adds twice the base risk', () => {
    // adjusted risk = 1 * (1 + 2*2) = 5
    expect(conquerorScore({ ...base, scarCount: 2 })).toBeCloseTo(8 / 5, 10);
  });

  it('is strictly decreasing in scar count', () => {
    let previous = Infinity;
    for (let scars = 0; scars <= 5; scars++) {
      const score = conquerorScore({ ...base, scarCount: scars });
      expect(score).toBeLessThan(previous);
      previous = score;
    }
  });

  it('scores exactly 0 for a zero denominator', () => {
    expect(conquerorScore({ ...base, risk: 0 })).toBe(0);
    expect(conquerorScore({ ...base, capital: 0 })).toBe(0);
    expect(conquerorScore({ ...base, historicalPenalty: 0 })).toBe(0);
  });

  it('scores 0 for non-finite inputs', () => {
    expect(conquerorScore({ ...base, capital: Number.POSITIVE_INFINITY })).toBe(0);
    expect(conquerorScore({ ...base, impact: Number.NaN })).toBe(0);
  });
});

describe('rankOptions', () => {
  it('orders by score and recommends the top entry', () => {
    const ranking = rankOptions(
      [option('Slow', { impact: 1 }), option('Fast', { impact: 9 })],
      () => 0,
    );
    expect(ranking.map((r) => [r.name, r.rank, r.recommended])).toEqual([
      ['Fast', 1, true],
      ['Slow', 2, false],
    ]);
    expect(ranking[0].score).toBeCloseTo(27, 10);
  });

  it('keeps input order for equal scores', () => {
    const ranking = rankOptions([option('A'), option('B'), option('C')], () => 0);
    expect(ranking.map((r) => r.name)).toEqual(['A', 'B', 'C']);
  });

  it('penalises options named in past scars', () => {
    const scars: Record<string, number> = { 'Vendor X': 3 };
    const ranking = rankOptions(
      [option('Vendor X', { impact: 9 }), option('Vendor Y', { impact: 4 })],
      (name) => scars[name] ?? 0,
    );
    // X: 27 / 7 ≈ 3.86, Y: 8
    expect(ranking.map((r) => r.name)).toEqual(['Vendor Y', 'Vendor X']);
    expect(ranking[1].scars).toBe(3);
  });

  it('returns [] for no options', () => {
    expect(rankOptions([], () => 0)).toEqual([]);
  });
});

describe('parseDecisionOptions', () => {
  it('reads the JSON array out of surrounding prose and fills defaults', () => {
    const reply =
      'Here you go:\n[{"name": "Expand", "impact": 8, "time": 3}, {"name": "Hold", "penalty": 2}]\nGood luck.';
    expect(parseDecisionOptions(reply)).toEqual({
      ok: true,
      value: [
        {
          name: 'Expand',
          impact: 8,
          certainty: 0.5,
          reversibility: 0.5,
          risk: 5,
          capital: 5,
          timeCost: 3,
          historicalPenalty: 1,
        },
        {
          name: 'Hold',
          impact: 5,
          certainty: 0.5,
          reversibility: 0.5,
          risk: 5,
          capital: 5,
          timeCost: 5,
          historicalPenalty: 2,
        },
      ],
    });
  });

  it('rejects a reply with no array', () => {
    expect(parseDecisionOptions('I cannot help with that')).toEqual({
      ok: false,
      reason: 'malformed',
      detail: 'no JSON array in reply',
    });
  });

  it('rejects invalid JSON', () => {
    const result = parseDecisionOptions('[{"name": "A",}]');
    expect(result.ok).toBe(false);
  });

  it('rejects missing names, wrong types and extra fields', () => {
    expect(parseDecisionOptions('[{"impact": 3}]').ok).toBe(false);
    expect(parseDecisionOptions('[{"name": "A", "impact": "high"}]').ok).toBe(false);
    expect(parseDecisionOptions('[{"name": "A", "mood": "bold"}]').ok).toBe(false);
  });

  it('rejects an empty list', () => {
    expect(parseDecisionOptions('[]').ok).toBe(false);
  });
});

describe('formatRanking', () => {
  it('labels the winner and numbers the rest', () => {
    expect(
      formatRanking([
        { name: 'Fast', score: 27, scars: 0, rank: 1, recommended: true },
        { name: 'Slow', score: 1 / 3, scars: 2, rank: 2, recommended: false },
      ]),
    ).toBe(
      'STRATEGIC RANKING:\n' +
        'WINNER: Fast | Conqueror Score: 27.00 (Detected Scars: 0)\n' +
        '#2: Slow | Conqueror Score: 0.33 (Detected Scars: 2)',
    );
  });
});
