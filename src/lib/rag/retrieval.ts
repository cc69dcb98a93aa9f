import { COMPLETION_ERROR_MARKER, type Completer } from './completer';
import { ErrorCode, RagError, getErrorMessage } from './errors';
import { withTimeout } from './timeout';
import type { QueryResult, SearchResult, Source } from './types';

export const DEFAULT_TOP_K = 5;
export const MAX_TOP_K = 20;

export const NO_CONTEXT_ANSWER = 'No relevant information found in the uploaded documents.';

export const SYSTEM_PROMPT = `You are a helpful AI assistant that answers questions based on the provided context.

Guidelines:
- Use only the information provided in the context to answer the question
- If the context doesn't contain enough information to fully answer the question, clearly state this
- Be accurate and specific
- Cite the sources when possible
- If multiple sources provide different information, acknowledge this
- Keep your response concise but comprehensive`;

export interface Retriever {
  search(query: string, k: number): Promise<SearchResult[]>;
}

export interface RetrievalEngineOptions {
  retriever: Retriever;
  completer: Completer;
  timeoutMs?: number;
  defaultTopK?: number;
}

export function clampTopK(k: number, fallback: number = DEFAULT_TOP_K): number {
  if (!Number.isFinite(k)) return fallback;
  return Math.max(1, Math.min(Math.floor(k), MAX_TOP_K));
}

export function buildContext(chunks: SearchResult[]): string {
  return chunks
    .map(
      (chunk, i) =>
        `[Source ${i + 1}: ${chunk.filename}, Page ${chunk.pageNumber}]\n${chunk.content}`
    )
    .join('\n\n');
}

export function buildUserPrompt(context: string, question: string): string {
  return `Context:
${context}

Question: ${question}

Please provide a helpful answer based on the context above.`;
}

/** Unique (filename, page) pairs in rank order, scored by first occurrence. */
export function extractSources(chunks: SearchResult[]): Source[] {
  const seen = new Set<string>();
  const sources: Source[] = [];

  for (const chunk of chunks) {
    const key = JSON.stringify([chunk.filename, chunk.pageNumber]);
    if (seen.has(key)) continue;
    seen.add(key);
    sources.push({
      filename: chunk.filename,
      pageNumber: chunk.pageNumber,
      similarityScore: Math.round(chunk.similarityScore * 1000) / 1000,
    });
  }

  return sources;
}

export class RetrievalEngine {
  private readonly retriever: Retriever;
  private readonly completer: Completer;
  private readonly timeoutMs: number;
  private readonly defaultTopK: number;

  constructor(options: RetrievalEngineOptions) {
    this.retriever = options.retriever;
    this.completer = options.completer;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.defaultTopK = clampTopK(options.defaultTopK ?? DEFAULT_TOP_K);
  }

  /**
   * Answer a question from the indexed documents. Retrieval errors
   * propagate; a failed completion yields a placeholder answer with
   * `degraded` set.
   */
  async query(question: string, k: number = this.defaultTopK): Promise<QueryResult> {
    const trimmed = question.trim();
    if (!trimmed) {
      throw new RagError(ErrorCode.INVALID_INPUT, 'Question cannot be empty');
    }

    const chunks = await this.retriever.search(trimmed, clampTopK(k, this.defaultTopK));

    if (chunks.length === 0) {
      return {
        answer: NO_CONTEXT_ANSWER,
        sources: [],
        contextUsed: false,
        chunksRetrieved: 0,
        degraded: false,
      };
    }

    const context = buildContext(chunks);
    const answer = await this.generateAnswer(trimmed, context);
    const degraded = answer.startsWith(COMPLETION_ERROR_MARKER);
    if (degraded) {
      console.warn(`${ErrorCode.COMPLETION_DEGRADED}: ${answer}`);
    }

    return {
      answer,
      sources: extractSources(chunks),
      contextUsed: true,
      chunksRetrieved: chunks.length,
      degraded,
    };
  }

  private async generateAnswer(question: string, context: string): Promise<string> {
    try {
      return await withTimeout('Completion request', this.timeoutMs, (signal) =>
        this.completer.complete(SYSTEM_PROMPT, buildUserPrompt(context, question), { signal })
      );
    } catch (error) {
      console.error('Answer generation error:', error);
      return `${COMPLETION_ERROR_MARKER} Answer generation failed: ${getErrorMessage(error)}`;
    }
  }
}
