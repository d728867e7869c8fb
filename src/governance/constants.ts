import { VAULT_DIR_NAME } from '../config.js';

// Directory names no action may touch, matched case-insensitively anywhere
// in the action description.
export const FORBIDDEN_DIRECTORIES = [
  'System32',
  'Windows',
  'AppData',
  '/etc',
  '/boot',
  '/sbin',
  '/usr/bin',
  VAULT_DIR_NAME,
] as const;

// Self-preservation: request phrases refused outright.
export const SELF_PRESERVATION_PHRASES = ['delete', 'format', 'remove system'] as const;

// Words that make a request expensive against the risk budget.
export const COSTLY_REQUEST_WORDS = ['decide', 'read', 'delete', 'move'] as const;
export const COSTLY_REQUEST_COST = 100;
export const ROUTINE_REQUEST_COST = 10;

// Regret-index weights charged when a self-preservation veto fires.
export const VETO_RISK_SCORE = 8;
export const VETO_IMPACT_SCORE = 9;
export const LOSS_PER_RISK_UNIT = 100;

export const DenialCodes = {
  PATH_VIOLATION: 'PATH_VIOLATION',
  BUDGET_EXCEEDED: 'BUDGET_EXCEEDED',
  SELF_PRESERVATION: 'SELF_PRESERVATION',
  SCAR_VETO: 'SCAR_VETO',
  INVALID_COST: 'INVALID_COST',
} as const;

export type DenialCode = (typeof DenialCodes)[keyof typeof DenialCodes];

/** Outcome of any policy check. A denial is a deliberate refusal, not an error. */
export type GateResult =
  | { allowed: true; code: null; reason: string }
  | { allowed: false; code: DenialCode; reason: string };

export const TriageModes = ['EXISTENTIAL', 'STRATEGIC', 'TACTICAL'] as const;
export type TriageMode = (typeof TriageModes)[number];
