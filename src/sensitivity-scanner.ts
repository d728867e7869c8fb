/**
 * Background sensitivity scanner.
 *
 * Per file: DISCOVERED → HASHED → (SKIP if digest unchanged) → CLASSIFIED
 *           → QUARANTINED | CLEARED
 *
 * An unchanged digest means no classifier call, no memory and no write to
 * processed_files. A failure on one file is logged and the sweep moves on.
 */
import fs from 'node:fs';
import path from 'node:path';

import {
  SCAN_EXCERPT_CHARS,
  SCAN_INTERVAL,
  SCAN_MAX_FILE_BYTES,
  SCAN_ROOTS,
  SENSITIVITY_THRESHOLD,
  VAULT_DIR,
} from './config.js';
import type { Guardrail } from './governance/guardrail.js';
import { logger } from './logger.js';
import { getProcessedFile, upsertProcessedFile } from './memory-db.js';
import { MemorySources } from './memory/constants.js';
import { rememberObservation } from './memory/remember.js';
import { discoverFiles } from './scanner/discovery.js';
import {
  classifySensitivity,
  effectiveScore,
} from './scanner/sensitivity-classifier.js';
import { readExcerpt } from './scanner/extract.js';
import { hashFile, quarantineFile } from './scanner/vault.js';
import type { CompletionClient, Embedder } from './types.js';

const QUARANTINE_RISK_COST = 1;

export type FileOutcome =
  | 'skipped' // digest unchanged, or too large to scan
  | 'cleared'
  | 'quarantined'
  | 'held' // sensitive, but the guardrail refused the move
  | 'failed';

export interface SweepStats {
  discovered: number;
  skipped: number;
  cleared: number;
  quarantined: number;
  held: number;
  failed: number;
}

export interface ScannerDependencies {
  classifier: CompletionClient;
  embedder: Embedder;
  guardrail: Guardrail;
}

export interface ScannerOptions {
  roots?: readonly string[];
  vaultDir?: string;
  threshold?: number;
  intervalMs?: number;
  excerptChars?: number;
  maxFileBytes?: number;
}

function emptyStats(): SweepStats {
  return { discovered: 0, skipped: 0, cleared: 0, quarantined: 0, held: 0, failed: 0 };
}

export class SensitivityScanner {
  private readonly roots: readonly string[];
  private readonly vaultDir: string;
  private readonly threshold: number;
  private readonly intervalMs: number;
  private readonly excerptChars: number;
  private readonly maxFileBytes: number;

  private stopped = true;
  private sweeping = false;
  private loop: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly deps: ScannerDependencies,
    options: ScannerOptions = {},
  ) {
    this.roots = options.roots ?? SCAN_ROOTS;
    this.vaultDir = options.vaultDir ?? VAULT_DIR;
    this.threshold = options.threshold ?? SENSITIVITY_THRESHOLD;
    this.intervalMs = options.intervalMs ?? SCAN_INTERVAL;
    this.excerptChars = options.excerptChars ?? SCAN_EXCERPT_CHARS;
    this.maxFileBytes = options.maxFileBytes ?? SCAN_MAX_FILE_BYTES;
  }

  get running(): boolean {
    return !this.stopped;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    logger.info(
      { roots: this.roots, vault: this.vaultDir, intervalMs: this.intervalMs },
      'Sensitivity scanner started',
    );
    this.loop = this.runLoop();
  }

  /** Stop after the current file; resolves once the loop has exited. */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.wake?.();
    this.wake = null;
    if (this.loop) await this.loop;
    this.loop = null;
  }

  private async runLoop(): Promise<void> {
    while (!this.stopped) {
      try {
        const stats = await this.sweep();
        logger.info(stats, 'Sensitivity sweep complete');
      } catch (err) {
        logger.error({ err }, 'Sensitivity sweep error');
      }
      if (this.stopped) break;
      await this.sleep(this.intervalMs);
    }
    logger.info('Sensitivity scanner stopped');
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }

  /** One full pass over the roots. */
  async sweep(): Promise<SweepStats> {
    const stats = emptyStats();
    if (this.sweeping) {
      logger.debug('Sweep already in progress');
      return stats;
    }

    this.sweeping = true;
    try {
      for await (const filePath of discoverFiles(this.roots, { vaultDir: this.vaultDir })) {
        stats.discovered++;
        const outcome = await this.processFile(filePath);
        stats[outcome]++;
        // A sweep started by start() ends early on stop(); a direct call runs to completion.
        if (this.stopped && this.loop) break;
      }
    } finally {
      this.sweeping = false;
    }
    return stats;
  }

  async processFile(filePath: string): Promise<FileOutcome> {
    try {
      const stat = await fs.promises.stat(filePath);
      if (stat.size > this.maxFileBytes) {
        logger.debug({ filePath, size: stat.size }, 'File too large to scan');
        return 'skipped';
      }

      const digest = await hashFile(filePath);
      const prior = getProcessedFile(filePath);
      if (prior && prior.content_hash === digest) return 'skipped';

      const excerpt = await readExcerpt(filePath, this.excerptChars);
      if (excerpt.trim().length === 0) {
        upsertProcessedFile(filePath, digest);
        return 'cleared';
      }

      const verdict = await classifySensitivity(this.deps.classifier, filePath, excerpt);
      if (verdict.kind === 'unscored') {
        logger.warn(
          { filePath, cause: verdict.cause },
          'Classifier gave no score, treating as not sensitive',
        );
      }
      const score = effectiveScore(verdict);

      if (score < this.threshold) {
        upsertProcessedFile(filePath, digest);
        return 'cleared';
      }

      const gate = this.deps.guardrail.consultFile(filePath, QUARANTINE_RISK_COST);
      if (!gate.allowed) {
        logger.warn({ filePath, score, code: gate.code }, 'Quarantine refused by guardrail');
        upsertProcessedFile(filePath, digest);
        return 'held';
      }

      const reason = verdict.kind === 'scored' ? verdict.reason : null;
      const destination = await quarantineFile(filePath, this.vaultDir, { score, reason });
      logger.warn({ filePath, destination, score }, 'Sensitive file moved to vault');

      upsertProcessedFile(filePath, digest);

      try {
        const memory = await rememberObservation(
          {
            content: `SECURITY ALERT: Moved ${path.basename(filePath)} to vault (Score: ${score})`,
            source: MemorySources.SECURITY_ACTION,
            outcome: 'success',
            confidence: 1.0,
          },
          this.deps.embedder,
        );
        if (!memory.ok) {
          logger.warn({ filePath, error: memory.error }, 'Quarantine memory rejected');
        }
      } catch (err) {
        logger.warn({ filePath, err }, 'Could not record quarantine memory');
      }
      return 'quarantined';
    } catch (err) {
      logger.warn({ filePath, err }, 'Scan failed for file');
      return 'failed';
    }
  }
}
