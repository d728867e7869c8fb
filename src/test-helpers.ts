/**
 * In-process stand-ins for the embedding and reasoning services.
 */
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type {
  CollaboratorFailure,
  CollaboratorResult,
  CompletionClient,
  Embedder,
} from './types.js';

const BAG_DIMS = 32;

/** Bag-of-words vector: each word bumps one of 32 buckets. Deterministic. */
export function bagOfWords(text: string): Float32Array {
  const vec = new Float32Array(BAG_DIMS);
  for (const word of text.toLowerCase().split(/\W+/).filter(Boolean)) {
    let bucket = 0;
    for (let i = 0; i < word.length; i++) bucket += word.charCodeAt(i);
    vec[bucket % BAG_DIMS] += 1;
  }
  return vec;
}

export class FakeEmbedder implements Embedder {
  readonly inputs: string[] = [];

  async embed(text: string): Promise<CollaboratorResult<Float32Array>> {
    this.inputs.push(text);
    return { ok: true, value: bagOfWords(text) };
  }
}

export class FailingEmbedder implements Embedder {
  constructor(private readonly reason: CollaboratorFailure = 'unreachable') {}

  async embed(): Promise<CollaboratorResult<Float32Array>> {
    return { ok: false, reason: this.reason };
  }
}

export interface RecordedCall {
  prompt: string;
  system?: string;
}

/**
 * Replays canned replies in order. A reply given as a failure reason is
 * returned as that failure. Once the script runs out the last entry repeats.
 */
export class ScriptedClient implements CompletionClient {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly script: Array<string | { fail: CollaboratorFailure }>) {}

  async complete(
    prompt: string,
    options: { system?: string } = {},
  ): Promise<CollaboratorResult<string>> {
    this.calls.push({ prompt, system: options.system });
    const index = Math.min(this.calls.length - 1, this.script.length - 1);
    const next = this.script[index];
    if (next === undefined) return { ok: false, reason: 'unreachable' };
    if (typeof next === 'string') return { ok: true, value: next };
    return { ok: false, reason: next.fail };
  }
}

export function makeTempDir(prefix = 'vigil-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function hoursAgo(hours: number, now: Date): string {
  return new Date(now.getTime() - hours * 3_600_000).toISOString();
}
