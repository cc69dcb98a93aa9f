import { ErrorCode, RagError } from './errors';
import type { Chunk } from './types';

export interface ChunkOptions {
  chunkSize?: number; // words per chunk
  overlap?: number;   // words of overlap between chunks
  totalPages?: number; // known page count, when the extractor reports one
}

export const DEFAULT_CHUNK_SIZE = 500;  // words
export const DEFAULT_OVERLAP = 50;      // words

// Rough density used when the page count is unknown
const CHUNKS_PER_PAGE = 3;

const UNSAFE_CHARS = /[^\p{L}\p{N}_\s.,!?;:\-()]/gu;

/**
 * Normalize text before chunking. The result is exactly the word tokens
 * joined by single spaces, so chunk offsets index straight into it.
 */
export function cleanText(text: string): string {
  return text.replace(UNSAFE_CHARS, ' ').replace(/\s+/g, ' ').trim();
}

export function validateChunkOptions(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RagError(
      ErrorCode.INVALID_CONFIGURATION,
      `chunkSize must be a positive integer, got ${chunkSize}`
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new RagError(
      ErrorCode.INVALID_CONFIGURATION,
      `overlap must be an integer in [0, ${chunkSize}), got ${overlap}`
    );
  }
}

/**
 * Approximate page for a chunk by linear interpolation over the document.
 * Page numbers produced here are estimates, never exact page boundaries.
 */
export function estimatePageNumber(
  chunkIndex: number,
  totalChunks: number,
  totalPages?: number
): number {
  if (totalChunks <= 0) return 1;

  const pages =
    totalPages !== undefined && totalPages > 0
      ? totalPages
      : Math.max(1, Math.floor(totalChunks / CHUNKS_PER_PAGE));

  return Math.max(1, Math.floor((chunkIndex / totalChunks) * pages));
}

export function chunkText(text: string, options: ChunkOptions = {}): Chunk[] {
  const {
    chunkSize = DEFAULT_CHUNK_SIZE,
    overlap = DEFAULT_OVERLAP,
    totalPages,
  } = options;
  validateChunkOptions(chunkSize, overlap);

  const cleaned = cleanText(text);
  const words = cleaned.length > 0 ? cleaned.split(' ') : [];

  if (words.length === 0) return [];

  const step = Math.max(chunkSize - overlap, 1);
  const windows: Omit<Chunk, 'pageNumber'>[] = [];
  let startIndex = 0;
  let startChar = 0;

  while (startIndex < words.length) {
    const endIndex = Math.min(startIndex + chunkSize, words.length);
    const content = words.slice(startIndex, endIndex).join(' ');

    windows.push({
      chunkIndex: windows.length,
      content,
      startChar,
      endChar: startChar + content.length,
      wordCount: endIndex - startIndex,
    });

    if (endIndex >= words.length) break;

    // Move to next chunk with overlap
    const nextIndex = startIndex + step;
    startChar += words.slice(startIndex, nextIndex).join(' ').length + 1;
    startIndex = nextIndex;
  }

  // Pages need the final chunk count, so they are assigned in a second pass
  return windows.map((window) => ({
    ...window,
    pageNumber: estimatePageNumber(window.chunkIndex, windows.length, totalPages),
  }));
}
