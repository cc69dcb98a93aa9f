export * from './chunking';
export * from './completer';
export * from './db';
export * from './embedder';
export * from './errors';
export * from './flat-index';
export * from './ingest';
export * from './retrieval';
export * from './vector-index';
export type * from './types';
