/**
 * Candidate discovery for the sensitivity scanner: recursive walk of the
 * scan roots, yielding document-like files. The vault and noisy system
 * directories are never entered; symlinks are not followed.
 */
import fs from 'node:fs';
import path from 'node:path';

import { logger } from '../logger.js';

export const DOCUMENT_EXTENSIONS: ReadonlySet<string> = new Set([
  '.txt',
  '.md',
  '.log',
  '.csv',
  '.json',
  '.env',
  '.pem',
  '.key',
  '.yaml',
  '.yml',
  '.xml',
  '.ini',
  '.conf',
  '.pdf',
  '.docx',
  '.doc',
]);

export const NOISY_DIRECTORIES: ReadonlySet<string> = new Set([
  'node_modules',
  '.git',
  '.cache',
  '__pycache__',
  'Windows',
  'Program Files',
  'Program Files (x86)',
  'AppData',
]);

// Pseudo-filesystems, skipped by absolute path.
const SYSTEM_PATHS: ReadonlySet<string> = new Set(['/proc', '/sys', '/dev']);

export interface DiscoveryOptions {
  vaultDir: string;
  extensions?: ReadonlySet<string>;
  noisyDirectories?: ReadonlySet<string>;
}

export function isDocumentFile(
  filePath: string,
  extensions: ReadonlySet<string> = DOCUMENT_EXTENSIONS,
): boolean {
  const base = path.basename(filePath);
  if (base.startsWith('~')) return false; // editor lock/temp files
  // ".env" has no extension in path terms; treat the whole name as one.
  const ext = path.extname(base).toLowerCase() || base.toLowerCase();
  return extensions.has(ext);
}

function isInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

export async function* discoverFiles(
  roots: readonly string[],
  options: DiscoveryOptions,
): AsyncGenerator<string> {
  const vault = path.resolve(options.vaultDir);
  const extensions = options.extensions ?? DOCUMENT_EXTENSIONS;
  const noisy = options.noisyDirectories ?? NOISY_DIRECTORIES;

  const stack = roots.map((r) => path.resolve(r)).reverse();
  while (stack.length > 0) {
    const dir = stack.pop();
    if (dir === undefined) break;
    if (isInside(dir, vault) || SYSTEM_PATHS.has(dir)) continue;

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      // Permission denied or vanished mid-walk
      logger.debug({ dir, err }, 'Skipping unreadable directory');
      continue;
    }

    const subdirs: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!noisy.has(entry.name) && !isInside(fullPath, vault)) {
          subdirs.push(fullPath);
        }
        continue;
      }
      if (entry.isFile() && isDocumentFile(fullPath, extensions)) {
        yield fullPath;
      }
    }
    // Depth-first, in directory listing order
    for (let i = subdirs.length - 1; i >= 0; i--) stack.push(subdirs[i]);
  }
}
