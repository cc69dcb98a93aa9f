import { describe, it, expect } from 'vitest';
import path from 'path';
import { thrownCode } from '@/test/helpers';
import { loadConfig } from './config';
import { ErrorCode } from './rag/errors';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      openaiApiKey: undefined,
      embedder: 'openai',
      embeddingModel: 'text-embedding-3-small',
      embeddingDimension: 1536,
      completionModel: 'gpt-4o-mini',
      useDummyLlm: false,
      vectorDbPath: path.resolve('data'),
      chunkSize: 500,
      chunkOverlap: 50,
      serviceTimeoutMs: 30_000,
      defaultTopK: 5,
    });
  });

  it('parses values from the environment', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      EMBEDDER: 'hashing',
      EMBEDDING_DIMENSION: '64',
      USE_DUMMY_LLM: 'YES',
      VECTOR_DB_PATH: 'tmp/index',
      CHUNK_SIZE: '200',
      CHUNK_OVERLAP: '20',
      SERVICE_TIMEOUT_MS: '0',
      DEFAULT_TOP_K: '8',
    });

    expect(config).toMatchObject({
      openaiApiKey: 'test-secret',
      embedder: 'hashing',
      embeddingDimension: 64,
      useDummyLlm: true,
      vectorDbPath: path.resolve('tmp/index'),
      chunkSize: 200,
      chunkOverlap: 20,
      serviceTimeoutMs: 0,
      defaultTopK: 8,
    });
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ OPENAI_API_KEY: '   ', CHUNK_SIZE: '', USE_DUMMY_LLM: ' ' });

    expect(config.openaiApiKey).toBeUndefined();
    expect(config.chunkSize).toBe(500);
    expect(config.useDummyLlm).toBe(false);
  });

  it.each([
    { CHUNK_SIZE: 'lots' },
    { CHUNK_SIZE: '0' },
    { EMBEDDING_DIMENSION: '12.5' },
    { EMBEDDER: 'cohere' },
    { USE_DUMMY_LLM: 'maybe' },
    { DEFAULT_TOP_K: '25' },
  ])('rejects %o', (env) => {
    expect(thrownCode(() => loadConfig(env))).toBe(ErrorCode.INVALID_CONFIGURATION);
  });

  it('requires the overlap to be smaller than the chunk size', () => {
    expect(() => loadConfig({ CHUNK_SIZE: '50', CHUNK_OVERLAP: '50' })).toThrow(
      'Invalid configuration: CHUNK_OVERLAP: CHUNK_OVERLAP must be smaller than CHUNK_SIZE'
    );
  });
});
