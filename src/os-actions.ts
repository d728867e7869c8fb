/**
 * OS action surface (power, network, display, input, window/app control).
 * Implementations live outside the core; the core only sees an idempotent
 * operation that reports success, gated by the guardrail when destructive.
 */
import type { GateResult } from './governance/constants.js';
import type { Guardrail } from './governance/guardrail.js';
import { logger } from './logger.js';

export interface OsAction {
  name: string;
  /** Human-readable target, checked by the path guard (e.g. a file path). */
  description: string;
  destructive: boolean;
  run(): Promise<boolean>;
}

export type OsActionOutcome =
  | { executed: true; succeeded: boolean }
  | { executed: false; gate: GateResult };

export async function runOsAction(
  action: OsAction,
  guardrail: Guardrail,
  riskCost: number,
): Promise<OsActionOutcome> {
  if (action.destructive) {
    const gate = guardrail.consult(`${action.name} ${action.description}`, riskCost);
    if (!gate.allowed) {
      logger.warn({ action: action.name, code: gate.code }, 'OS action refused');
      return { executed: false, gate };
    }
  }

  try {
    const succeeded = await action.run();
    logger.info({ action: action.name, succeeded }, 'OS action finished');
    return { executed: true, succeeded };
  } catch (err) {
    logger.warn({ action: action.name, err }, 'OS action threw');
    return { executed: true, succeeded: false };
  }
}
