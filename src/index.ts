/**
 * Vigil: interactive loop plus the background sensitivity scanner.
 *
 * Usage: npm run dev   (or npm run build && npm start)
 */
import readline from 'node:readline/promises';

import { handleRequest, recordFeedback, type FeedbackVerdict } from './agent.js';
import { DB_PATH, VAULT_DIR } from './config.js';
import { getDatabasePath, initDatabase } from './db.js';
import { Guardrail } from './governance/guardrail.js';
import { OllamaClient } from './llm.js';
import { logger } from './logger.js';
import { getMemoryStats } from './memory-db.js';
import { HttpEmbedder } from './memory/embedding.js';
import { ensureVault } from './scanner/vault.js';
import { SensitivityScanner } from './sensitivity-scanner.js';

const EXIT_WORDS = new Set(['exit', 'quit']);
const REPORT_WORDS = new Set(['report', 'health', 'status']);

function healthReport(guardrail: Guardrail): string {
  const stats = getMemoryStats();
  const gate = guardrail.snapshot();
  return [
    '--- HEALTH REPORT ---',
    `Memories: ${stats.total} (strategic ${stats.strategic}, tactical ${stats.tactical})`,
    `Average confidence: ${stats.average_confidence}`,
    `Scars: ${stats.scars}`,
    `Files processed (delta sync): ${stats.processed_files}`,
    `Risk budget: ${gate.budgetSpent}/${gate.budgetCeiling}`,
    `Emergency vetoes: ${gate.emergencyVetoCount} (potential loss saved: ${gate.regret.potentialLossSaved})`,
    '---------------------',
  ].join('\n');
}

function parseVerdict(answer: string): FeedbackVerdict {
  const a = answer.trim().toLowerCase();
  if (a === 'yes' || a === 'y') return 'yes';
  if (a === 'no' || a === 'n') return 'no';
  return 'skip';
}

async function main(): Promise<void> {
  initDatabase(DB_PATH);
  ensureVault(VAULT_DIR);
  logger.info({ db: getDatabasePath(), vault: VAULT_DIR }, 'Database initialized');

  const llm = new OllamaClient();
  const embedder = new HttpEmbedder();
  const guardrail = new Guardrail();

  const scanner = new SensitivityScanner({ classifier: llm, embedder, guardrail });
  scanner.start();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received');
    await scanner.stop();
    process.exit(0);
  };
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
  // Ctrl-C while the prompt is active arrives on the interface, not the process
  rl.on('SIGINT', () => void shutdown('SIGINT'));

  for (;;) {
    const input = (await rl.question('\nYou: ')).trim();
    if (!input) continue;
    if (EXIT_WORDS.has(input.toLowerCase())) break;

    if (REPORT_WORDS.has(input.toLowerCase())) {
      console.log(healthReport(guardrail));
      continue;
    }

    const reply = await handleRequest(input, { llm, embedder, guardrail });
    console.log(`Vigil: ${reply.text}`);
    if (reply.kind === 'refused') continue;

    const verdict = parseVerdict(
      await rl.question('\n[?] Was this outcome successful? (yes/no/skip): '),
    );
    const lesson =
      verdict === 'no' ? await rl.question('[!] What went wrong? ') : null;
    await recordFeedback(input, reply.text, verdict, lesson, { embedder });
  }

  rl.close();
  await scanner.stop();
}

main().catch((err) => {
  logger.error({ err }, 'Failed to start Vigil');
  process.exit(1);
});
