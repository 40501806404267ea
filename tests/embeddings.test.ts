import { afterEach, describe, expect, it, vi } from 'vitest';

import { FatalCapabilityError, TransientCapabilityError } from '../src/errors.js';
import {
  bufferToEmbedding,
  cosineSimilarity,
  embeddingToBuffer,
  OpenAIEmbedder,
} from '../src/knowledge/embeddings.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenAIEmbedder', () => {
  it('returns the vector from the API', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ data: [{ embedding: [0.5, -0.25] }] }));
    vi.stubGlobal('fetch', fetchMock);

    const vector = await new OpenAIEmbedder('test-key', 'test-model').embed('hello');

    expect(Array.from(vector)).toEqual([0.5, -0.25]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('sends the model and input', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse({ data: [{ embedding: [1] }] }));
    vi.stubGlobal('fetch', fetchMock);

    await new OpenAIEmbedder('test-key', 'test-model').embed('hello');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/embeddings');
    expect(init.body).toBe(JSON.stringify({ model: 'test-model', input: 'hello' }));
  });

  it('fails fatally without an API key', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    await expect(new OpenAIEmbedder('').embed('hello')).rejects.toBeInstanceOf(FatalCapabilityError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('does not retry client errors', async () => {
    const fetchMock = vi.fn(async () => new Response('bad request', { status: 400 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(new OpenAIEmbedder('test-key').embed('hello')).rejects.toBeInstanceOf(FatalCapabilityError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries rate limits and server errors', async () => {
    const fetchMock = vi
      .fn<() => Promise<Response>>()
      .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
      .mockResolvedValueOnce(new Response('oops', { status: 503 }))
      .mockResolvedValue(jsonResponse({ data: [{ embedding: [1, 0] }] }));
    vi.stubGlobal('fetch', fetchMock);

    const vector = await new OpenAIEmbedder('test-key').embed('hello');
    expect(Array.from(vector)).toEqual([1, 0]);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('gives up after the configured attempts', async () => {
    const fetchMock = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    vi.stubGlobal('fetch', fetchMock);

    await expect(new OpenAIEmbedder('test-key').embed('hello')).rejects.toBeInstanceOf(TransientCapabilityError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('treats a response without a vector as transient', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ data: [] }));
    vi.stubGlobal('fetch', fetchMock);
    await expect(new OpenAIEmbedder('test-key').embed('hello')).rejects.toThrow('Embedding response had no vector');
  });
});

describe('embedding storage', () => {
  it('survives a trip through a buffer', () => {
    const vector = new Float32Array([0.5, -1.5, 3]);
    expect(Array.from(bufferToEmbedding(embeddingToBuffer(vector)))).toEqual([0.5, -1.5, 3]);
  });
});

describe('cosineSimilarity', () => {
  it('scores direction, not magnitude', () => {
    expect(cosineSimilarity(new Float32Array([1, 2]), new Float32Array([2, 4]))).toBeCloseTo(1, 6);
    expect(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([0, 1]))).toBe(0);
    expect(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([-1, 0]))).toBeCloseTo(-1, 6);
  });

  it('is zero for empty directions and mismatched lengths', () => {
    expect(cosineSimilarity(new Float32Array([0, 0]), new Float32Array([1, 1]))).toBe(0);
    expect(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([1, 0, 0]))).toBe(0);
  });
});
