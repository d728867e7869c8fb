// Scar veto: a request that echoes a severe past lesson is refused until
// a human overrides it. Milder scars are surfaced but do not block.

import { logger } from '../logger.js';
import { checkTrauma, VETO_SEVERITY, type TraumaMatch } from '../scar-db.js';
import { DenialCodes, type GateResult } from './constants.js';

export type VetoCheck = GateResult & { scar: TraumaMatch | null };

export function checkScarVeto(requestText: string): VetoCheck {
  const scar = checkTrauma(requestText);
  if (!scar) {
    return { allowed: true, code: null, reason: 'No matching scar', scar: null };
  }

  if (scar.severity >= VETO_SEVERITY) {
    logger.warn({ severity: scar.severity, lesson: scar.lesson }, 'Scar veto');
    return {
      allowed: false,
      code: DenialCodes.SCAR_VETO,
      reason: `STRATEGIC VETO: this path matches a previous critical failure. Reason: ${scar.lesson}. Manual override required.`,
      scar,
    };
  }

  return {
    allowed: true,
    code: null,
    reason: `Caution: similar to a past mistake (severity ${scar.severity}): ${scar.lesson}`,
    scar,
  };
}
