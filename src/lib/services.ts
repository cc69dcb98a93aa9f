import type { Config } from './config';
import {
  type Completer,
  DummyCompleter,
  type Embedder,
  ErrorCode,
  HashingEmbedder,
  OpenAICompleter,
  OpenAIEmbedder,
  RagError,
  RetrievalEngine,
  VectorIndex,
} from './rag';

export interface RagServices {
  config: Config;
  index: VectorIndex;
  engine: RetrievalEngine;
  close(): void;
}

export function createEmbedder(config: Config): Embedder {
  if (config.embedder === 'hashing') {
    return new HashingEmbedder(config.embeddingDimension);
  }
  if (!config.openaiApiKey) {
    throw new RagError(
      ErrorCode.INVALID_CONFIGURATION,
      'OPENAI_API_KEY is required for the openai embedder (set EMBEDDER=hashing to run offline)'
    );
  }
  return new OpenAIEmbedder({
    apiKey: config.openaiApiKey,
    model: config.embeddingModel,
    dimension: config.embeddingDimension,
  });
}

export function createCompleter(config: Config): Completer {
  if (config.useDummyLlm) {
    return new DummyCompleter();
  }
  if (!config.openaiApiKey) {
    console.warn('OPENAI_API_KEY is not set, answering in dummy mode');
    return new DummyCompleter();
  }
  return new OpenAICompleter({
    apiKey: config.openaiApiKey,
    model: config.completionModel,
  });
}

export function createServices(config: Config): RagServices {
  const index = new VectorIndex({
    directory: config.vectorDbPath,
    embedder: createEmbedder(config),
    timeoutMs: config.serviceTimeoutMs,
  });

  const engine = new RetrievalEngine({
    retriever: index,
    completer: createCompleter(config),
    timeoutMs: config.serviceTimeoutMs,
    defaultTopK: config.defaultTopK,
  });

  return { config, index, engine, close: () => index.close() };
}
