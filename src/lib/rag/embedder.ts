import OpenAI from 'openai';
import { ErrorCode, RagError, getErrorMessage } from './errors';
import type { CallOptions } from './types';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_DIMENSION = 1536; // OpenAI text-embedding-3-small dimension

export interface Embedder {
  readonly dimension: number;
  embed(text: string, options?: CallOptions): Promise<number[]>;
}

/** The slice of the OpenAI client the embedder calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string; dimensions?: number },
      options?: { signal?: AbortSignal }
    ): PromiseLike<{ data: Array<{ embedding: number[] }> }>;
  };
}

export function normalize(vector: ArrayLike<number>): number[] {
  let norm = 0;
  for (let i = 0; i < vector.length; i++) {
    norm += vector[i] * vector[i];
  }
  norm = Math.sqrt(norm);

  return Array.from(vector, (value) => (norm > 0 ? value / norm : 0));
}

export interface OpenAIEmbedderOptions {
  apiKey?: string;
  model?: string;
  dimension?: number;
  client?: EmbeddingsClient;
}

export class OpenAIEmbedder implements Embedder {
  readonly dimension: number;
  private readonly model: string;
  private readonly client: EmbeddingsClient;

  constructor(options: OpenAIEmbedderOptions = {}) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.dimension = options.dimension ?? DEFAULT_DIMENSION;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
  }

  async embed(text: string, options: CallOptions = {}): Promise<number[]> {
    let embedding: number[] | undefined;
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: text,
          // Only the text-embedding-3 family accepts a requested size
          ...(this.model.startsWith('text-embedding-3')
            ? { dimensions: this.dimension }
            : {}),
        },
        { signal: options.signal }
      );
      embedding = response.data[0]?.embedding;
    } catch (error) {
      throw new RagError(
        ErrorCode.EMBEDDING_FAILURE,
        `Failed to generate embedding: ${getErrorMessage(error)}`,
        error
      );
    }

    if (!embedding || embedding.length === 0) {
      throw new RagError(ErrorCode.EMBEDDING_FAILURE, 'Embedding response was empty');
    }
    return normalize(embedding);
  }
}

/**
 * Offline embedder: hashes word and bigram features into a fixed number of
 * signed buckets. Deterministic, so identical text maps to identical vectors.
 */
export class HashingEmbedder implements Embedder {
  constructor(readonly dimension: number = DEFAULT_DIMENSION) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RagError(
        ErrorCode.INVALID_CONFIGURATION,
        `Embedding dimension must be a positive integer, got ${dimension}`
      );
    }
  }

  async embed(text: string): Promise<number[]> {
    const tokens = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
    const vector = new Array<number>(this.dimension).fill(0);

    const addFeature = (feature: string, weight: number) => {
      const hash = fnv1a(feature);
      const sign = hash & 1 ? -1 : 1;
      vector[(hash >>> 1) % this.dimension] += sign * weight;
    };

    tokens.forEach((token) => addFeature(token, 1));
    // Bigrams with smaller weight to capture short phrases
    for (let i = 0; i < tokens.length - 1; i++) {
      addFeature(`${tokens[i]}__${tokens[i + 1]}`, 0.5);
    }

    return normalize(vector);
  }
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
