import { describe, it, expect, beforeEach } from 'vitest';
import { handleRequest, recordFeedback, triageMode, type AgentDependencies } from './agent.js';
import { _initTestDatabase } from './db.js';
import { DenialCodes } from './governance/constants.js';
import { Guardrail } from './governance/guardrail.js';
import { appendMemory, getAllMemories, getMemoryById } from './memory-db.js';
import { getAllScars, registerScar } from './scar-db.js';
import { FakeEmbedder, ScriptedClient } from './test-helpers.js';

const NOW = new Date('2026-06-01T12:00:00.000Z');

function deps(
  llm: ScriptedClient,
  guardrail = new Guardrail({ ceiling: 5000 }),
): AgentDependencies {
  return { llm, embedder: new FakeEmbedder(), guardrail, now: () => NOW };
}

function seedMemory(id: string, content: string): void {
  appendMemory({
    id,
    content,
    source: 'file scan',
    outcome: 'neutral',
    confidence: 0.5,
    tier: 'tactical',
    embedding: null,
    created_at: NOW.toISOString(),
  });
}

describe('triageMode', () => {
  it('puts existential words ahead of strategic ones', () => {
    expect(triageMode('We have a security problem with the plan')).toBe('EXISTENTIAL');
    expect(triageMode('Our five year plan')).toBe('STRATEGIC');
    expect(triageMode('Book a meeting room')).toBe('TACTICAL');
  });
});

describe('handleRequest', () => {
  beforeEach(() => {
    _initTestDatabase();
  });

  it('refuses a request that repeats a severe past failure before anything else', async () => {
    registerScar('delete all logs', 0.9, 'deleted logs without backup');
    const llm = new ScriptedClient(['should not be asked']);
    const guardrail = new Guardrail({ ceiling: 0 });

    const reply = await handleRequest('please delete all logs now', deps(llm, guardrail));

    expect(reply).toEqual({
      kind: 'refused',
      code: DenialCodes.SCAR_VETO,
      text:
        'STRATEGIC VETO: this path matches a previous critical failure. ' +
        'Reason: deleted logs without backup. Manual override required.',
    });
    expect(llm.calls).toEqual([]);
  });

  it('refuses once the risk budget is spent', async () => {
    const reply = await handleRequest(
      'hello there',
      deps(new ScriptedClient(['hi']), new Guardrail({ ceiling: 5 })),
    );
    expect(reply).toEqual({
      kind: 'refused',
      code: DenialCodes.BUDGET_EXCEEDED,
      text: 'BUDGET VETO: risk 0 + 10 exceeds the damage budget of 5.',
    });
  });

  it('forgets memories by keyword', async () => {
    seedMemory('a', 'Project Apollo kickoff');
    seedMemory('b', 'Hiring pipeline');

    const reply = await handleRequest('Forget about Apollo', deps(new ScriptedClient(['x'])));

    expect(reply).toEqual({
      kind: 'forgotten',
      removed: 1,
      text: "Wiped 1 memory related to 'apollo'.",
    });
    expect(getMemoryById('a')).toBeUndefined();
    expect(getMemoryById('b')).toBeDefined();
  });

  it('handles "delete memory" as a forget rather than a self-preservation breach', async () => {
    seedMemory('a', 'old apollo note');
    seedMemory('b', 'apollo budget');
    const guardrail = new Guardrail({ ceiling: 5000 });

    const reply = await handleRequest('delete memory apollo', deps(new ScriptedClient(['x']), guardrail));

    expect(reply.kind).toBe('forgotten');
    expect(reply.text).toBe("Wiped 2 memories related to 'apollo'.");
    expect(guardrail.snapshot().emergencyVetoCount).toBe(0);
  });

  it('ranks options for a decision request', async () => {
    const llm = new ScriptedClient([
      '[{"name": "Plan A", "impact": 9}, {"name": "Plan B", "impact": 4}]',
    ]);

    const reply = await handleRequest('Help me decide between Plan A and Plan B', deps(llm));

    expect(reply.kind).toBe('ranking');
    // A: 27 * 0.25 / 125 = 0.054, B: 8 * 0.25 / 125 = 0.016
    expect(reply.text).toBe(
      'STRATEGIC RANKING:\n' +
        'WINNER: Plan A | Conqueror Score: 0.05 (Detected Scars: 0)\n' +
        '#2: Plan B | Conqueror Score: 0.02 (Detected Scars: 0)',
    );
    expect(llm.calls[0].system).toBe('You are a strategic analyst.');
  });

  it('reports an unavailable parser instead of ranking garbage', async () => {
    const down = await handleRequest(
      'compare vendors',
      deps(new ScriptedClient([{ fail: 'unreachable' }])),
    );
    expect(down).toEqual({
      kind: 'unavailable',
      text: 'Strategic parser unavailable (unreachable).',
    });

    const garbled = await handleRequest('compare vendors', deps(new ScriptedClient(['no idea'])));
    expect(garbled).toEqual({
      kind: 'unavailable',
      text: 'Strategic parser returned options I could not validate.',
    });
  });

  it('refuses destructive requests and reports the regret index', async () => {
    const guardrail = new Guardrail({ ceiling: 5000 });
    const reply = await handleRequest('format the disk', deps(new ScriptedClient(['x']), guardrail));

    expect(reply).toEqual({
      kind: 'refused',
      code: DenialCodes.SELF_PRESERVATION,
      text:
        'CONSTITUTIONAL BREACH: this action violates the core principle of self-preservation.\n' +
        '[Regret index: 7200 potential loss saved]',
    });
    expect(guardrail.snapshot().emergencyVetoCount).toBe(1);
    expect(guardrail.snapshot().budgetSpent).toBe(0);
  });

  it('does not charge the budget for a request the path guard refuses', async () => {
    const guardrail = new Guardrail({ ceiling: 5000 });
    const reply = await handleRequest(
      'open C:/Windows/System32 please',
      deps(new ScriptedClient(['x']), guardrail),
    );

    expect(reply).toEqual({
      kind: 'refused',
      code: DenialCodes.PATH_VIOLATION,
      text: "CONSTITUTIONAL VETO: access to restricted directory 'System32' denied.",
    });
    expect(guardrail.snapshot().budgetSpent).toBe(0);
  });

  it('path-guards a forget request before deleting anything', async () => {
    seedMemory('a', 'notes on /etc/hosts');
    const guardrail = new Guardrail({ ceiling: 5000 });

    const reply = await handleRequest('forget about /etc/hosts', deps(new ScriptedClient(['x']), guardrail));

    expect(reply.kind).toBe('refused');
    expect(getMemoryById('a')).toBeDefined();
    expect(guardrail.snapshot().budgetSpent).toBe(0);
  });

  it('charges the budget once for an answered request', async () => {
    const guardrail = new Guardrail({ ceiling: 5000 });
    await handleRequest('hello there', deps(new ScriptedClient(['hi']), guardrail));
    expect(guardrail.snapshot().budgetSpent).toBe(10);
  });

  it('refuses requests that touch forbidden directories', async () => {
    const reply = await handleRequest('show me /etc/passwd', deps(new ScriptedClient(['x'])));
    expect(reply).toEqual({
      kind: 'refused',
      code: DenialCodes.PATH_VIOLATION,
      text: "CONSTITUTIONAL VETO: access to restricted directory '/etc' denied.",
    });
  });

  it('answers with recalled memories in the system prompt', async () => {
    seedMemory('a', 'Vendor contract signed');
    const llm = new ScriptedClient(['  Ship the beta.  ']);

    const reply = await handleRequest('what should we focus on this week?', deps(llm));

    expect(reply).toEqual({ kind: 'answer', mode: 'TACTICAL', degraded: false, text: 'Ship the beta.' });
    expect(llm.calls[0].prompt).toBe('what should we focus on this week?');
    expect(llm.calls[0].system).toContain('OPERATING_MODE: TACTICAL');
    expect(llm.calls[0].system).toContain('[TACTICAL MEMORY - Trust: 0.67] Vendor contract signed');
  });

  it('falls back to recalled memories when the reasoning service is down', async () => {
    seedMemory('a', 'Vendor contract signed');
    const reply = await handleRequest(
      'what should we focus on this week?',
      deps(new ScriptedClient([{ fail: 'timeout' }])),
    );
    expect(reply).toEqual({
      kind: 'answer',
      mode: 'TACTICAL',
      degraded: true,
      text:
        'Reasoning service unavailable. Most relevant memories:\n' +
        '[TACTICAL MEMORY - Trust: 0.67] Vendor contract signed',
    });
  });

  it('says so when there is nothing to fall back on', async () => {
    const reply = await handleRequest('status of the launch?', deps(new ScriptedClient([{ fail: 'timeout' }])));
    expect(reply.text).toBe('Reasoning service unavailable and no memories recorded yet.');
  });

  it('prefixes the answer with a caution for a mild scar', async () => {
    registerScar('hire fast', 0.5, 'contractor overran');
    const reply = await handleRequest(
      'should we use a contractor for the website',
      deps(new ScriptedClient(['Sure.'])),
    );
    expect(reply.text).toBe(
      'Caution: similar to a past mistake (severity 0.5): contractor overran\nSure.',
    );
  });
});

describe('recordFeedback', () => {
  beforeEach(() => {
    _initTestDatabase();
  });

  it('turns a failure with a lesson into a scar and a failure memory', async () => {
    const result = await recordFeedback(
      'pick vendor X',
      'Go with X',
      'no',
      '  vendor X missed deadlines ',
      { embedder: new FakeEmbedder() },
    );

    expect(result.scar).toEqual({ ok: true, id: 1, duplicate: false });
    expect(getAllScars()[0]).toMatchObject({ severity: 0.9, lesson: 'vendor X missed deadlines' });

    expect(getAllMemories()[0]).toMatchObject({
      content: 'User: pick vendor X | AI: Go with X',
      source: 'executive interaction',
      outcome: 'failure',
      confidence: 0.2,
      tier: 'tactical',
    });
  });

  it('records a success as a high-confidence strategic memory without a scar', async () => {
    const result = await recordFeedback('plan Q3', 'Focus on retention', 'yes', null, {
      embedder: new FakeEmbedder(),
    });
    expect(result.scar).toBeNull();
    expect(getAllMemories()[0]).toMatchObject({
      outcome: 'success',
      confidence: 0.9,
      tier: 'strategic',
    });
  });

  it('records a skipped verdict as neutral', async () => {
    await recordFeedback('book travel', 'Booked', 'skip', null, { embedder: new FakeEmbedder() });
    expect(getAllMemories()[0]).toMatchObject({ outcome: 'neutral', confidence: 0.5 });
  });

  it('does not scar a failure without a lesson', async () => {
    const result = await recordFeedback('book travel', 'Booked', 'no', '   ', {
      embedder: new FakeEmbedder(),
    });
    expect(result.scar).toBeNull();
    expect(getAllScars()).toEqual([]);
  });
});
