import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

import { OllamaClient, createOllamaBackend } from '@matchgraph/llm';

function jsonResponse(body: unknown) {
  return { ok: true, status: 200, json: async () => body, text: async () => JSON.stringify(body) };
}

function requestBody(callIndex = 0): unknown {
  return JSON.parse(mockFetch.mock.calls[callIndex][1].body);
}

describe('OllamaClient', () => {
  const client = new OllamaClient('http://ollama.test/');

  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('posts non-streaming generate requests', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ model: 'mistral', response: 'Hello', done: true }));

    const result = await client.generate({ model: 'mistral', prompt: 'Say hello' });

    expect(result.response).toBe('Hello');
    expect(mockFetch.mock.calls[0][0]).toBe('http://ollama.test/api/generate');
    expect(requestBody()).toEqual({ model: 'mistral', prompt: 'Say hello', stream: false });
  });

  it('defaults a missing response field to an empty string', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ done: true }));

    const result = await client.generate({ model: 'mistral', prompt: 'x' });
    expect(result.response).toBe('');
  });

  it('throws with status and body on a failed generate', async () => {
    mockFetch.mockResolvedValue({ ok: false, status: 500, text: async () => 'model not loaded' });

    await expect(client.generate({ model: 'mistral', prompt: 'x' })).rejects.toThrow(
      'Ollama generate failed: 500 - model not loaded',
    );
  });

  it('aborts the request when the caller signal is already aborted', async () => {
    let seenAborted: boolean | undefined;
    mockFetch.mockImplementation(async (_url: string, init: RequestInit) => {
      seenAborted = init.signal?.aborted;
      return jsonResponse({ response: 'late' });
    });

    const outer = new AbortController();
    outer.abort();
    await client.generate({ model: 'mistral', prompt: 'x' }, { signal: outer.signal });

    expect(seenAborted).toBe(true);
  });

  it('embeds a batch of texts', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ embeddings: [[1, 0], [0, 1]] }));

    const vectors = await client.embed(['a', 'b'], { model: 'embed-test' });

    expect(vectors).toEqual([[1, 0], [0, 1]]);
    expect(mockFetch.mock.calls[0][0]).toBe('http://ollama.test/api/embed');
    expect(requestBody()).toEqual({ model: 'embed-test', input: ['a', 'b'] });
  });

  it('throws on a failed embed', async () => {
    mockFetch.mockResolvedValue({ ok: false, status: 404, text: async () => 'no such model' });

    await expect(client.embed(['a'], { model: 'embed-test' })).rejects.toThrow(
      'Ollama embed failed: 404 - no such model',
    );
  });

  describe('isAvailable', () => {
    it('is false when the server cannot be reached', async () => {
      mockFetch.mockRejectedValue(new Error('ECONNREFUSED'));
      expect(await client.isAvailable()).toBe(false);
    });

    it('matches a model by name prefix', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ models: [{ name: 'mistral:latest' }] }));

      expect(await client.isAvailable('mistral')).toBe(true);
      expect(await client.isAvailable('llama3')).toBe(false);
    });
  });
});

describe('createOllamaBackend', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('maps a completion request onto generate options', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ response: 'Shares the ML stack.' }));
    const backend = createOllamaBackend(new OllamaClient('http://ollama.test'), 'reason-test');

    const text = await backend.complete(
      { prompt: 'Why?', temperature: 0.3, maxTokens: 60 },
      { timeout: 1000 },
    );

    expect(text).toBe('Shares the ML stack.');
    expect(backend.name).toBe('ollama');
    expect(backend.isConfigured()).toBe(true);
    expect(requestBody()).toEqual({
      model: 'reason-test',
      prompt: 'Why?',
      options: { temperature: 0.3, num_predict: 60 },
      stream: false,
    });
  });
});
