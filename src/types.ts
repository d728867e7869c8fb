/**
 * Contracts for the external collaborators the core depends on.
 * The core never sees a thrown error from a collaborator: every call
 * resolves to a tagged result.
 */

export type CollaboratorFailure =
  | 'timeout'
  | 'http_error'
  | 'unreachable'
  | 'malformed'
  | 'disabled';

export type CollaboratorResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: CollaboratorFailure; detail?: string };

/** Embedding service: deterministic for the same input within a session. */
export interface Embedder {
  embed(text: string): Promise<CollaboratorResult<Float32Array>>;
}

/** Reasoning/classification service. */
export interface CompletionClient {
  complete(
    prompt: string,
    options?: { system?: string },
  ): Promise<CollaboratorResult<string>>;
}

/** Map a fetch rejection onto a collaborator failure. */
export function failureFromError(err: unknown): {
  ok: false;
  reason: CollaboratorFailure;
  detail: string;
} {
  const name = err instanceof Error ? err.name : '';
  const detail = err instanceof Error ? err.message : String(err);
  if (name === 'TimeoutError' || name === 'AbortError') {
    return { ok: false, reason: 'timeout', detail };
  }
  return { ok: false, reason: 'unreachable', detail };
}
