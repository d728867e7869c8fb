/**
 * Guardrail / risk-budget gate.
 *
 * Check order for consult() and consultFile(): path guard → budget guard.
 * Deny-wins.
 * The budget counter only moves up, and only on approval; there is no
 * refund path within a session. All state lives on the instance so each
 * session (and each test) gets its own ledger.
 */
import { RISK_BUDGET_CEILING } from '../config.js';
import { logger } from '../logger.js';
import {
  COSTLY_REQUEST_COST,
  COSTLY_REQUEST_WORDS,
  DenialCodes,
  FORBIDDEN_DIRECTORIES,
  LOSS_PER_RISK_UNIT,
  ROUTINE_REQUEST_COST,
  SELF_PRESERVATION_PHRASES,
  VETO_IMPACT_SCORE,
  VETO_RISK_SCORE,
  type GateResult,
} from './constants.js';

export interface RegretIndex {
  totalRiskAvoided: number;
  potentialLossSaved: number;
  vetoSavedSituations: number;
}

export interface GuardrailSnapshot {
  budgetSpent: number;
  budgetCeiling: number;
  budgetRemaining: number;
  emergencyVetoCount: number;
  regret: RegretIndex;
}

export interface GuardrailOptions {
  ceiling?: number;
  forbiddenDirectories?: readonly string[];
}

export class Guardrail {
  private readonly ceiling: number;
  private readonly forbidden: readonly string[];
  private spent = 0;
  private emergencyVetoCount = 0;
  private regret: RegretIndex = {
    totalRiskAvoided: 0,
    potentialLossSaved: 0,
    vetoSavedSituations: 0,
  };

  constructor(options: GuardrailOptions = {}) {
    this.ceiling = options.ceiling ?? RISK_BUDGET_CEILING;
    this.forbidden = options.forbiddenDirectories ?? FORBIDDEN_DIRECTORIES;
  }

  /** Path guard, then budget guard. Only an approval charges the budget. */
  consult(actionDescription: string, riskCost: number): GateResult {
    const path = this.checkPath(actionDescription);
    if (!path.allowed) return path;
    return this.checkBudget(riskCost);
  }

  /**
   * Path guard, then budget guard, for an action on one file. Forbidden
   * entries must match whole path segments, so `~/windows_notes.txt` is
   * not mistaken for the Windows directory.
   */
  consultFile(filePath: string, riskCost: number): GateResult {
    const hit = this.forbidden.find((dir) => pathHasForbiddenDir(filePath, dir));
    if (hit) {
      logger.warn({ dir: hit, filePath }, 'Path guard denied file action');
      return pathViolation(hit);
    }
    return this.checkBudget(riskCost);
  }

  /** Deny any action that names a forbidden directory, regardless of budget. */
  checkPath(actionDescription: string): GateResult {
    const lower = actionDescription.toLowerCase();
    const hit = this.forbidden.find((dir) => lower.includes(dir.toLowerCase()));
    if (hit) {
      logger.warn({ dir: hit }, 'Path guard denied action');
      return pathViolation(hit);
    }
    return { allowed: true, code: null, reason: 'Path clear' };
  }

  /** Allow iff spent + cost <= ceiling; on approval the counter grows by cost. */
  checkBudget(riskCost: number): GateResult {
    if (!Number.isFinite(riskCost) || riskCost < 0) {
      return {
        allowed: false,
        code: DenialCodes.INVALID_COST,
        reason: `Invalid risk cost: ${riskCost}`,
      };
    }

    if (this.spent + riskCost > this.ceiling) {
      logger.warn(
        { spent: this.spent, cost: riskCost, ceiling: this.ceiling },
        'Risk budget exceeded',
      );
      return {
        allowed: false,
        code: DenialCodes.BUDGET_EXCEEDED,
        reason: `BUDGET VETO: risk ${this.spent} + ${riskCost} exceeds the damage budget of ${this.ceiling}.`,
      };
    }

    this.spent += riskCost;
    return {
      allowed: true,
      code: null,
      reason: `Budget ok (${this.spent}/${this.ceiling})`,
    };
  }

  /**
   * Self-preservation rule for free-text requests. A refusal bumps the
   * emergency veto count and the regret index.
   */
  checkSelfPreservation(requestText: string): GateResult {
    const lower = requestText.toLowerCase();
    const phrase = SELF_PRESERVATION_PHRASES.find((p) => lower.includes(p));
    if (!phrase) {
      return { allowed: true, code: null, reason: 'Constitutional clearance granted' };
    }

    this.emergencyVetoCount += 1;
    this.regret.totalRiskAvoided += VETO_RISK_SCORE;
    this.regret.potentialLossSaved +=
      VETO_RISK_SCORE * VETO_IMPACT_SCORE * LOSS_PER_RISK_UNIT;
    this.regret.vetoSavedSituations += 1;
    logger.warn({ phrase, vetoes: this.emergencyVetoCount }, 'Self-preservation veto');

    return {
      allowed: false,
      code: DenialCodes.SELF_PRESERVATION,
      reason: 'CONSTITUTIONAL BREACH: this action violates the core principle of self-preservation.',
    };
  }

  snapshot(): GuardrailSnapshot {
    return {
      budgetSpent: this.spent,
      budgetCeiling: this.ceiling,
      budgetRemaining: this.ceiling - this.spent,
      emergencyVetoCount: this.emergencyVetoCount,
      regret: { ...this.regret },
    };
  }
}

function pathViolation(dir: string): GateResult {
  return {
    allowed: false,
    code: DenialCodes.PATH_VIOLATION,
    reason: `CONSTITUTIONAL VETO: access to restricted directory '${dir}' denied.`,
  };
}

function segments(p: string): string[] {
  return p
    .toLowerCase()
    .split(/[\\/]+/)
    .filter((s) => s.length > 0 && !/^[a-z]:$/.test(s));
}

/**
 * Rooted entries ("/etc") must prefix the path; bare names ("AppData")
 * may sit at any depth.
 */
export function pathHasForbiddenDir(filePath: string, dir: string): boolean {
  const target = segments(filePath);
  const wanted = segments(dir);
  if (wanted.length === 0) return false;
  const matchesAt = (start: number) => wanted.every((s, i) => target[start + i] === s);

  if (dir.startsWith('/')) return matchesAt(0);
  for (let start = 0; start + wanted.length <= target.length; start++) {
    if (matchesAt(start)) return true;
  }
  return false;
}

/** 100 for requests that decide, read, delete or move; 10 otherwise. */
export function estimateRiskCost(requestText: string): number {
  const lower = requestText.toLowerCase();
  return COSTLY_REQUEST_WORDS.some((w) => lower.includes(w))
    ? COSTLY_REQUEST_COST
    : ROUTINE_REQUEST_COST;
}
