import { chunkText, type ChunkOptions } from './chunking';
import type { VectorIndex } from './vector-index';

export interface IngestInput extends ChunkOptions {
  documentId: number;
  filename: string;
  text: string;
}

export interface IngestResult {
  documentId: number;
  filename: string;
  chunks: number;
  vectorIds: string[];
}

/** Chunk extracted document text and add it to the index. */
export async function ingestText(
  index: Pick<VectorIndex, 'add'>,
  input: IngestInput
): Promise<IngestResult> {
  const { documentId, filename, text, ...chunkOptions } = input;
  const chunks = chunkText(text, chunkOptions);

  if (chunks.length === 0) {
    return { documentId, filename, chunks: 0, vectorIds: [] };
  }

  const vectorIds = await index.add(chunks, documentId, filename);
  return { documentId, filename, chunks: chunks.length, vectorIds };
}
