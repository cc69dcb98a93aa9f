export interface Chunk {
  chunkIndex: number;
  content: string;
  startChar: number; // offset into the normalized text
  endChar: number;
  wordCount: number;
  pageNumber: number; // estimated, see estimatePageNumber
}

export interface ChunkRecord {
  vectorId: string;
  documentId: number;
  chunkIndex: number;
  filename: string;
  content: string;
  pageNumber: number;
  startChar: number;
  endChar: number;
  createdAt: number;
}

export interface SearchResult extends ChunkRecord {
  similarityScore: number;
  rank: number;
}

export interface DocumentMetadata {
  documentId: number;
  filename: string;
  totalChunks: number;
  createdAt: number;
}

export interface IndexStats {
  totalVectors: number;
  dimension: number;
  totalDocuments: number;
  indexFileExists: boolean;
  metadataFileExists: boolean;
}

export interface Source {
  filename: string;
  pageNumber: number;
  similarityScore: number;
}

export interface QueryResult {
  answer: string;
  sources: Source[];
  contextUsed: boolean;
  chunksRetrieved: number;
  degraded: boolean;
}

export interface CallOptions {
  signal?: AbortSignal;
}
