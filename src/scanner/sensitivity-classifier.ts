/**
 * Asks the reasoning service for a 0-100 confidentiality score.
 *
 * Accepted replies, in order of preference:
 *   1. JSON object {"sensitivity_score": int, "reason"?: string}
 *   2. the first integer anywhere in the reply
 * Anything else (or a collaborator failure) is an unscored verdict, which
 * the scanner treats as score 0: classifier malfunction fails open.
 */
import path from 'node:path';
import { z } from 'zod';

import type { CollaboratorFailure, CompletionClient } from '../types.js';
import { extractFirstInteger, extractJsonObject } from '../utils.js';

export type SensitivityVerdict =
  | { kind: 'scored'; score: number; reason: string | null }
  | { kind: 'unscored'; cause: CollaboratorFailure | 'unparseable'; detail?: string };

const JsonVerdict = z
  .object({
    sensitivity_score: z.number().int().min(0).max(100),
    reason: z.string().optional(),
  })
  .strict();

export function parseSensitivityReply(reply: string): SensitivityVerdict {
  const obj = extractJsonObject(reply);
  if (obj !== undefined) {
    const parsed = JsonVerdict.safeParse(obj);
    if (parsed.success) {
      return {
        kind: 'scored',
        score: parsed.data.sensitivity_score,
        reason: parsed.data.reason ?? null,
      };
    }
    return { kind: 'unscored', cause: 'unparseable', detail: parsed.error.message };
  }

  const score = extractFirstInteger(reply);
  if (score === null || score > 100) {
    return { kind: 'unscored', cause: 'unparseable', detail: reply.slice(0, 80) };
  }
  return { kind: 'scored', score, reason: null };
}

export function effectiveScore(verdict: SensitivityVerdict): number {
  return verdict.kind === 'scored' ? verdict.score : 0;
}

export function buildClassificationPrompt(filePath: string, excerpt: string): string {
  return (
    'Analyze if this file content is confidential (passwords, API keys, private keys, ' +
    'bank or card numbers, government IDs, confidential business strategy). ' +
    'Score 0-100. Return ONLY the number.\n' +
    `File: ${path.basename(filePath)}\n` +
    `Content: ${excerpt}`
  );
}

export async function classifySensitivity(
  client: CompletionClient,
  filePath: string,
  excerpt: string,
): Promise<SensitivityVerdict> {
  const result = await client.complete(buildClassificationPrompt(filePath, excerpt));
  if (!result.ok) {
    return { kind: 'unscored', cause: result.reason, detail: result.detail };
  }
  return parseSensitivityReply(result.value);
}
