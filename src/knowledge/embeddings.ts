import type { EmbeddingCapability } from '../capabilities.js';
import { EMBEDDING_MODEL } from '../config.js';
import { FatalCapabilityError, TransientCapabilityError } from '../errors.js';
import { logger } from '../logger.js';
import { withRetry } from '../retry.js';

const OPENAI_EMBEDDING_URL = 'https://api.openai.com/v1/embeddings';

const TIMEOUT_MS = 10_000; // 10s per attempt

interface EmbeddingResponse {
  data: Array<{ embedding: number[] }>;
}

function isEmbeddingResponse(value: unknown): value is EmbeddingResponse {
  if (typeof value !== 'object' || value === null || !('data' in value)) return false;
  const data = value.data;
  return (
    Array.isArray(data) &&
    data.length > 0 &&
    typeof data[0] === 'object' &&
    data[0] !== null &&
    Array.isArray(data[0].embedding)
  );
}

export class OpenAIEmbedder implements EmbeddingCapability {
  constructor(
    private readonly apiKey: string | undefined = process.env.OPENAI_API_KEY,
    private readonly model: string = EMBEDDING_MODEL,
  ) {}

  async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    if (!this.apiKey) {
      throw new FatalCapabilityError(
        'OPENAI_API_KEY not set, required for knowledge embeddings',
      );
    }
    return withRetry(() => this.requestOnce(text, signal), {
      signal,
      label: 'embedding',
    });
  }

  private async requestOnce(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), TIMEOUT_MS);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(OPENAI_EMBEDDING_URL, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ model: this.model, input: text }),
        signal: controller.signal,
      });

      if (response.ok) {
        const json: unknown = await response.json();
        if (!isEmbeddingResponse(json)) {
          throw new TransientCapabilityError('Embedding response had no vector');
        }
        return new Float32Array(json.data[0].embedding);
      }

      const body = await response.text().catch(() => '');
      // Rate limit (429) or server error (5xx) → retry
      if (response.status === 429 || response.status >= 500) {
        throw new TransientCapabilityError(
          `OpenAI ${response.status}: ${body.slice(0, 200)}`,
        );
      }
      // Client error (4xx except 429) → fail immediately
      throw new FatalCapabilityError(
        `OpenAI embedding failed (${response.status}): ${body.slice(0, 200)}`,
      );
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      if (err instanceof TransientCapabilityError || err instanceof FatalCapabilityError) {
        throw err;
      }
      if (err instanceof Error && err.name === 'AbortError') {
        throw new TransientCapabilityError(`OpenAI embedding timeout after ${TIMEOUT_MS}ms`);
      }
      // fetch rejects with TypeError on network failure
      if (err instanceof TypeError) {
        logger.debug({ err: err.message }, 'Embedding network error');
        throw new TransientCapabilityError(`Network error: ${err.message}`, { cause: err });
      }
      throw err;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

export function embeddingToBuffer(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

export function bufferToEmbedding(buffer: Buffer): Float32Array {
  // Copy so the vector doesn't alias SQLite's buffer (alignment isn't guaranteed)
  const copy = new Uint8Array(buffer.byteLength);
  copy.set(buffer);
  return new Float32Array(copy.buffer, 0, buffer.byteLength / 4);
}

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
  return denom === 0 ? 0 : dot / denom;
}
