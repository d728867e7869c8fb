import { describe, it, expect, afterEach, vi } from 'vitest';
import { OllamaClient } from './llm.js';

const config = { baseUrl: 'http://llm.test', model: 'test-model', timeoutMs: 1000 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('OllamaClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends system and user messages without streaming', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({ message: { role: 'assistant', content: '42' } }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const result = await new OllamaClient(config).complete('score this', {
      system: 'You are a classifier.',
    });
    expect(result).toEqual({ ok: true, value: '42' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://llm.test/api/chat');
    expect(init.method).toBe('POST');
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'You are a classifier.' },
        { role: 'user', content: 'score this' },
      ],
      stream: false,
    });
  });

  it('omits the system message when none is given', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({ message: { content: 'ok' } }),
    );
    vi.stubGlobal('fetch', fetchMock);

    await new OllamaClient(config).complete('hi');
    const body = JSON.parse(String(fetchMock.mock.calls[0][1].body));
    expect(body.messages).toEqual([{ role: 'user', content: 'hi' }]);
  });

  it('reports an HTTP error status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'no model' }, 404)));
    expect(await new OllamaClient(config).complete('hi')).toEqual({
      ok: false,
      reason: 'http_error',
      detail: 'HTTP 404',
    });
  });

  it('reports a body without message content as malformed', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ done: true })));
    const result = await new OllamaClient(config).complete('hi');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe('malformed');
  });

  it('reports a non-JSON body as malformed', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>oops</html>')));
    const result = await new OllamaClient(config).complete('hi');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe('malformed');
  });

  it('maps a timeout onto the timeout reason', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        const err = new Error('The operation was aborted due to timeout');
        err.name = 'TimeoutError';
        throw err;
      }),
    );
    const result = await new OllamaClient(config).complete('hi');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe('timeout');
  });

  it('maps a refused connection onto unreachable', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    );
    const result = await new OllamaClient(config).complete('hi');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe('unreachable');
  });
});
