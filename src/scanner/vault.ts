/**
 * Quarantine vault: a hidden per-user directory that is the only
 * destination for files judged sensitive. Moves are a single rename where
 * possible; across devices the file is copied and the source unlinked.
 */
import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

import { logger } from '../logger.js';

export interface QuarantineMeta {
  original_path: string;
  score: number;
  reason: string | null;
  moved_at: string;
}

/** SHA-256 of the file's full content, streamed. */
export function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);
    stream.on('error', reject);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

export function ensureVault(vaultDir: string): void {
  fs.mkdirSync(vaultDir, { recursive: true, mode: 0o700 });
}

/** `YYYYMMDD_HHMMSS` in UTC. */
export function vaultTimestamp(date: Date): string {
  const iso = date.toISOString(); // 2026-10-18T09:05:03.123Z
  return `${iso.slice(0, 4)}${iso.slice(5, 7)}${iso.slice(8, 10)}_${iso.slice(11, 13)}${iso.slice(14, 16)}${iso.slice(17, 19)}`;
}

function uniqueDestination(vaultDir: string, baseName: string): string {
  let candidate = path.join(vaultDir, baseName);
  for (let n = 1; fs.existsSync(candidate); n++) {
    candidate = path.join(vaultDir, `${n}_${baseName}`);
  }
  return candidate;
}

/**
 * Move `filePath` into the vault under a timestamp-prefixed name and write
 * a sibling `.meta.json` (best-effort). Returns the destination path.
 */
export async function quarantineFile(
  filePath: string,
  vaultDir: string,
  details: { score: number; reason: string | null },
  now: Date = new Date(),
): Promise<string> {
  ensureVault(vaultDir);
  const destination = uniqueDestination(
    vaultDir,
    `${vaultTimestamp(now)}_${path.basename(filePath)}`,
  );

  try {
    await fs.promises.rename(filePath, destination);
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
    await fs.promises.copyFile(filePath, destination, fs.constants.COPYFILE_EXCL);
    await fs.promises.unlink(filePath);
  }

  const meta: QuarantineMeta = {
    original_path: filePath,
    score: details.score,
    reason: details.reason,
    moved_at: now.toISOString(),
  };
  // The file is already in the vault; a missing sidecar must not undo that.
  try {
    await fs.promises.writeFile(
      `${destination}.meta.json`,
      JSON.stringify(meta, null, 2),
    );
  } catch (err) {
    logger.warn({ destination, err }, 'Could not write quarantine metadata');
  }

  return destination;
}
