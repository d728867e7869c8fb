import os from 'node:os';
import path from 'node:path';

const PROJECT_ROOT = process.cwd();
const HOME_DIR = process.env.HOME || os.homedir();

export const STORE_DIR = path.resolve(
  process.env.VIGIL_STORE_DIR || path.join(PROJECT_ROOT, 'store'),
);
export const DB_FILE = process.env.VIGIL_DB_FILE || 'vigil.db';
export const DB_PATH = path.join(STORE_DIR, DB_FILE);

// Hidden, per-user. The name doubles as a forbidden directory for the guardrail.
export const VAULT_DIR_NAME = '.vigil_secure_vault';
export const VAULT_DIR = path.resolve(
  process.env.VIGIL_VAULT_DIR || path.join(HOME_DIR, VAULT_DIR_NAME),
);

export const SCAN_ROOTS = (process.env.VIGIL_SCAN_ROOTS || HOME_DIR)
  .split(',')
  .map((r) => r.trim())
  .filter(Boolean);

export const SCAN_INTERVAL = intEnv('SCAN_INTERVAL_MS', 3_600_000); // 1h between sweeps
export const SENSITIVITY_THRESHOLD = intEnv('SENSITIVITY_THRESHOLD', 80);
export const SCAN_EXCERPT_CHARS = intEnv('SCAN_EXCERPT_CHARS', 1000);
export const SCAN_MAX_FILE_BYTES = intEnv('SCAN_MAX_FILE_BYTES', 50 * 1024 * 1024);

export const RISK_BUDGET_CEILING = intEnv('RISK_BUDGET_CEILING', 5000);

// --- Collaborators (read at call time so tests can override) ---

export function getLlmConfig() {
  return {
    baseUrl: process.env.LLM_BASE_URL || 'http://127.0.0.1:11434',
    model: process.env.LLM_MODEL || 'llama3',
    timeoutMs: intEnv('LLM_TIMEOUT_MS', 8000),
  };
}

export function getEmbeddingConfig() {
  return {
    baseUrl: process.env.EMBED_BASE_URL || 'http://127.0.0.1:11434/v1',
    model: process.env.EMBED_MODEL || 'all-minilm',
    apiKey: process.env.EMBED_API_KEY || '',
    timeoutMs: intEnv('EMBED_TIMEOUT_MS', 5000),
  };
}

export function intEnv(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined || val === '') return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}
