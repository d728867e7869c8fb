/**
 * Foreground request path.
 *
 * scar veto → path guard → self-preservation (plain requests only) →
 * risk budget → (forget | decide | recall + reasoning). Every refusal comes
 * back as a reply with a reason; a dead reasoning service degrades to a
 * local answer built from recalled memories.
 */
import type { DenialCode, TriageMode } from './governance/constants.js';
import {
  formatRanking,
  parseDecisionOptions,
  rankOptions,
  type RankedOption,
} from './governance/decision.js';
import { estimateRiskCost, type Guardrail } from './governance/guardrail.js';
import { checkScarVeto } from './governance/veto.js';
import { logger } from './logger.js';
import { deleteMemoriesMatching, type AppendResult } from './memory-db.js';
import { MemorySources, type MemoryOutcome } from './memory/constants.js';
import { formatContext, retrieve } from './memory/recall.js';
import { rememberObservation } from './memory/remember.js';
import { registerScar, type RegisterScarResult } from './scar-db.js';
import type { CompletionClient, Embedder } from './types.js';
import { truncate } from './utils.js';

const CONTEXT_SIZE = 5;
const FEEDBACK_SCAR_SEVERITY = 0.9;
const MAX_REMEMBERED_REPLY = 2000;

const FORGET_PHRASES = ['forget about', 'delete memory'];
const DECISION_WORDS = ['decide', 'compare'];
const EXISTENTIAL_WORDS = ['danger', 'problem', 'fail', 'security', 'error'];
const STRATEGIC_WORDS = ['plan', 'strategy', 'future', 'ceo', 'goal'];

export interface AgentDependencies {
  llm: CompletionClient;
  embedder: Embedder;
  guardrail: Guardrail;
  now?: () => Date;
}

export type AgentReply =
  | { kind: 'refused'; code: DenialCode; text: string }
  | { kind: 'forgotten'; removed: number; text: string }
  | { kind: 'ranking'; ranking: RankedOption[]; text: string }
  | { kind: 'answer'; mode: TriageMode; degraded: boolean; text: string }
  | { kind: 'unavailable'; text: string };

export function triageMode(text: string): TriageMode {
  const lower = text.toLowerCase();
  if (EXISTENTIAL_WORDS.some((w) => lower.includes(w))) return 'EXISTENTIAL';
  if (STRATEGIC_WORDS.some((w) => lower.includes(w))) return 'STRATEGIC';
  return 'TACTICAL';
}

export async function handleRequest(
  text: string,
  deps: AgentDependencies,
): Promise<AgentReply> {
  const lower = text.toLowerCase();

  const veto = checkScarVeto(text);
  if (!veto.allowed) {
    return { kind: 'refused', code: veto.code, text: veto.reason };
  }

  const path = deps.guardrail.checkPath(text);
  if (!path.allowed) {
    return { kind: 'refused', code: path.code, text: path.reason };
  }

  const forget = FORGET_PHRASES.find((p) => lower.includes(p));
  const deciding = !forget && DECISION_WORDS.some((w) => lower.includes(w));

  // "delete memory" is a forget, not a destructive system request
  if (!forget && !deciding) {
    const constitution = deps.guardrail.checkSelfPreservation(text);
    if (!constitution.allowed) {
      const saved = deps.guardrail.snapshot().regret.potentialLossSaved;
      return {
        kind: 'refused',
        code: constitution.code,
        text: `${constitution.reason}\n[Regret index: ${saved} potential loss saved]`,
      };
    }
  }

  // Charged last, so a refused request never spends budget
  const budget = deps.guardrail.checkBudget(estimateRiskCost(text));
  if (!budget.allowed) {
    return { kind: 'refused', code: budget.code, text: budget.reason };
  }

  if (forget) {
    const keyword = FORGET_PHRASES.reduce((s, p) => s.replace(p, ''), lower).trim();
    const removed = deleteMemoriesMatching(keyword);
    logger.info({ keyword, removed }, 'Memories forgotten');
    return {
      kind: 'forgotten',
      removed,
      text: keyword
        ? `Wiped ${removed} memor${removed === 1 ? 'y' : 'ies'} related to '${keyword}'.`
        : 'Nothing to forget: no keyword given.',
    };
  }

  if (deciding) {
    return rankDecision(text, deps);
  }

  const caution = veto.scar ? `${veto.reason}\n` : '';
  const reply = await answer(text, deps);
  return { ...reply, text: caution + reply.text };
}

async function rankDecision(
  text: string,
  deps: AgentDependencies,
): Promise<AgentReply> {
  const prompt =
    `Extract decision parameters for each option in this text: "${text}"\n` +
    'Return ONLY a raw JSON list of objects without any backticks or extra text:\n' +
    '[{"name": "Option Name", "impact": 1-10, "certainty": 0.1-1.0, "reversibility": 0.1-1.0, ' +
    '"risk": 1-10, "capital": 1-10, "time": 1-10, "penalty": 1.0}]';

  const completion = await deps.llm.complete(prompt, {
    system: 'You are a strategic analyst.',
  });
  if (!completion.ok) {
    return {
      kind: 'unavailable',
      text: `Strategic parser unavailable (${completion.reason}).`,
    };
  }

  const options = parseDecisionOptions(completion.value);
  if (!options.ok) {
    logger.warn({ detail: options.detail }, 'Decision options rejected');
    return {
      kind: 'unavailable',
      text: 'Strategic parser returned options I could not validate.',
    };
  }

  const ranking = rankOptions(options.value);
  return { kind: 'ranking', ranking, text: formatRanking(ranking) };
}

async function answer(
  text: string,
  deps: AgentDependencies,
): Promise<Extract<AgentReply, { kind: 'answer' }>> {
  const mode = triageMode(text);
  const recalled = await retrieve(text, CONTEXT_SIZE, {
    embedder: deps.embedder,
    now: deps.now?.(),
  });
  const context = formatContext(recalled);

  const system = [
    `OPERATING_MODE: ${mode}`,
    '',
    `INSTITUTIONAL MEMORY (prioritized for ${mode}):`,
    context || '(none)',
    '',
    '- If MODE is EXISTENTIAL, warn the user about past failures first.',
    '- If MODE is STRATEGIC, lean on high-trust historical successes.',
    '- If MODE is TACTICAL, focus on immediate execution steps.',
  ].join('\n');

  const completion = await deps.llm.complete(text, { system });
  if (completion.ok) {
    return { kind: 'answer', mode, degraded: false, text: completion.value.trim() };
  }

  return {
    kind: 'answer',
    mode,
    degraded: true,
    text: context
      ? `Reasoning service unavailable. Most relevant memories:\n${context}`
      : 'Reasoning service unavailable and no memories recorded yet.',
  };
}

// --- Post-decision feedback ---

export type FeedbackVerdict = 'yes' | 'no' | 'skip';

const FEEDBACK_OUTCOME: Record<FeedbackVerdict, { outcome: MemoryOutcome; confidence: number }> = {
  yes: { outcome: 'success', confidence: 0.9 },
  no: { outcome: 'failure', confidence: 0.2 },
  skip: { outcome: 'neutral', confidence: 0.5 },
};

export interface FeedbackResult {
  memory: AppendResult;
  scar: RegisterScarResult | null;
}

/**
 * Record how an interaction turned out. A "no" with a lesson becomes a
 * permanent scar; every interaction becomes a memory either way.
 */
export async function recordFeedback(
  request: string,
  reply: string,
  verdict: FeedbackVerdict,
  lesson: string | null,
  deps: Pick<AgentDependencies, 'embedder'>,
): Promise<FeedbackResult> {
  let scar: RegisterScarResult | null = null;
  if (verdict === 'no' && lesson && lesson.trim()) {
    scar = registerScar(request, FEEDBACK_SCAR_SEVERITY, lesson.trim());
  }

  const { outcome, confidence } = FEEDBACK_OUTCOME[verdict];
  const memory = await rememberObservation(
    {
      content: `User: ${request} | AI: ${truncate(reply, MAX_REMEMBERED_REPLY)}`,
      source: MemorySources.INTERACTIVE,
      outcome,
      confidence,
    },
    deps.embedder,
  );

  return { memory, scar };
}
