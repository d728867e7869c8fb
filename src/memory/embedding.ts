/**
 * Embedding engine: OpenAI-compatible `/embeddings` endpoint
 * (a local Ollama serves the same shape under /v1).
 * Provides cosine similarity for semantic recall.
 *
 * Env vars:
 *   EMBED_BASE_URL     (default: http://127.0.0.1:11434/v1)
 *   EMBED_MODEL        (default: all-minilm)
 *   EMBED_API_KEY      (optional bearer token)
 *   EMBED_TIMEOUT_MS   (default: 5000)
 *   EMBEDDINGS_ENABLED (set to 0 to disable; recall falls back to trust order)
 */
import { z } from 'zod';

import { getEmbeddingConfig } from '../config.js';
import { logger } from '../logger.js';
import {
  failureFromError,
  type CollaboratorResult,
  type Embedder,
} from '../types.js';

export function embeddingsEnabled(): boolean {
  return process.env.EMBEDDINGS_ENABLED !== '0';
}

const EmbeddingResponse = z.object({
  data: z
    .array(z.object({ embedding: z.array(z.number()).min(1) }))
    .min(1),
});

export class HttpEmbedder implements Embedder {
  constructor(private readonly config = getEmbeddingConfig()) {}

  async embed(text: string): Promise<CollaboratorResult<Float32Array>> {
    if (!embeddingsEnabled()) return { ok: false, reason: 'disabled' };

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}/embeddings`, {
        method: 'POST',
        headers,
        body: JSON.stringify({ model: this.config.model, input: text }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      const failure = failureFromError(err);
      logger.warn({ reason: failure.reason, detail: failure.detail }, 'Embedding call failed');
      return failure;
    }

    if (!response.ok) {
      logger.warn({ status: response.status }, 'Embedding HTTP error');
      return {
        ok: false,
        reason: 'http_error',
        detail: `HTTP ${response.status}`,
      };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      return failureFromJson(err);
    }

    const parsed = EmbeddingResponse.safeParse(body);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.length }, 'Malformed embedding response');
      return { ok: false, reason: 'malformed', detail: parsed.error.message };
    }
    return { ok: true, value: new Float32Array(parsed.data.data[0].embedding) };
  }
}

function failureFromJson(err: unknown): CollaboratorResult<never> {
  const failure = failureFromError(err);
  // A body that stalls past the deadline is a timeout; anything else is bad JSON.
  if (failure.reason === 'timeout') return failure;
  return { ok: false, reason: 'malformed', detail: failure.detail };
}

/** Serialize a Float32Array to a Buffer for SQLite BLOB storage. */
export function embeddingToBuffer(embedding: Float32Array): Buffer {
  return Buffer.from(
    embedding.buffer,
    embedding.byteOffset,
    embedding.byteLength,
  );
}

/** Deserialize a Buffer from SQLite BLOB back to Float32Array. */
export function bufferToEmbedding(buf: Buffer): Float32Array {
  // Copy: the BLOB's backing buffer may not be 4-byte aligned.
  const copy = new Uint8Array(buf.byteLength);
  copy.set(buf);
  return new Float32Array(
    copy.buffer,
    0,
    buf.byteLength / Float32Array.BYTES_PER_ELEMENT,
  );
}

/**
 * Cosine similarity between two vectors.
 * Returns value in [-1, 1]: 1 = identical, 0 = orthogonal, -1 = opposite.
 * Vectors of different length (mixed dimensionality) score 0.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;

  return dot / denom;
}
