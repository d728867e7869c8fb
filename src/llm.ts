/**
 * Reasoning service client: Ollama chat API (`POST /api/chat`).
 * Every call is bounded by LLM_TIMEOUT_MS; a timeout is reported like any
 * other collaborator failure and never thrown.
 */
import { z } from 'zod';

import { getLlmConfig } from './config.js';
import { logger } from './logger.js';
import {
  failureFromError,
  type CollaboratorResult,
  type CompletionClient,
} from './types.js';

const ChatResponse = z.object({
  message: z.object({ content: z.string() }),
});

export class OllamaClient implements CompletionClient {
  constructor(private readonly config = getLlmConfig()) {}

  async complete(
    prompt: string,
    options: { system?: string } = {},
  ): Promise<CollaboratorResult<string>> {
    const messages: Array<{ role: string; content: string }> = [];
    if (options.system) messages.push({ role: 'system', content: options.system });
    messages.push({ role: 'user', content: prompt });

    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.config.model, messages, stream: false }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      const failure = failureFromError(err);
      logger.warn(
        { model: this.config.model, reason: failure.reason, detail: failure.detail },
        'Completion call failed',
      );
      return failure;
    }

    if (!response.ok) {
      logger.warn({ status: response.status }, 'Completion HTTP error');
      return { ok: false, reason: 'http_error', detail: `HTTP ${response.status}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      const failure = failureFromError(err);
      if (failure.reason === 'timeout') return failure;
      return { ok: false, reason: 'malformed', detail: failure.detail };
    }

    const parsed = ChatResponse.safeParse(body);
    if (!parsed.success) {
      return { ok: false, reason: 'malformed', detail: parsed.error.message };
    }
    return { ok: true, value: parsed.data.message.content };
  }
}
