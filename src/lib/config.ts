import path from 'path';
import { z } from 'zod';
import { DEFAULT_CHUNK_SIZE, DEFAULT_OVERLAP } from './rag/chunking';
import { DEFAULT_COMPLETION_MODEL } from './rag/completer';
import { DEFAULT_DIMENSION, DEFAULT_EMBEDDING_MODEL } from './rag/embedder';
import { ErrorCode, RagError } from './rag/errors';
import { DEFAULT_TOP_K, MAX_TOP_K } from './rag/retrieval';

const booleanFlag = z
  .string()
  .default('false')
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const configSchema = z
  .object({
    OPENAI_API_KEY: z.string().optional(),
    EMBEDDER: z.enum(['openai', 'hashing']).default('openai'),
    EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(DEFAULT_DIMENSION),
    COMPLETION_MODEL: z.string().min(1).default(DEFAULT_COMPLETION_MODEL),
    USE_DUMMY_LLM: booleanFlag,
    VECTOR_DB_PATH: z.string().min(1).default(path.join(process.cwd(), 'data')),
    CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(DEFAULT_OVERLAP),
    SERVICE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30_000),
    DEFAULT_TOP_K: z.coerce.number().int().min(1).max(MAX_TOP_K).default(DEFAULT_TOP_K),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

export interface Config {
  openaiApiKey?: string;
  embedder: 'openai' | 'hashing';
  embeddingModel: string;
  embeddingDimension: number;
  completionModel: string;
  useDummyLlm: boolean;
  vectorDbPath: string;
  chunkSize: number;
  chunkOverlap: number;
  serviceTimeoutMs: number;
  defaultTopK: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Treat blank variables as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = configSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new RagError(ErrorCode.INVALID_CONFIGURATION, `Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    openaiApiKey: values.OPENAI_API_KEY,
    embedder: values.EMBEDDER,
    embeddingModel: values.EMBEDDING_MODEL,
    embeddingDimension: values.EMBEDDING_DIMENSION,
    completionModel: values.COMPLETION_MODEL,
    useDummyLlm: values.USE_DUMMY_LLM,
    vectorDbPath: path.resolve(values.VECTOR_DB_PATH),
    chunkSize: values.CHUNK_SIZE,
    chunkOverlap: values.CHUNK_OVERLAP,
    serviceTimeoutMs: values.SERVICE_TIMEOUT_MS,
    defaultTopK: values.DEFAULT_TOP_K,
  };
}
