import OpenAI, {
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';
import type { CallOptions } from './types';

export const DEFAULT_COMPLETION_MODEL = 'gpt-4o-mini';

/** Prefix of every placeholder answer substituted for a failed completion. */
export const COMPLETION_ERROR_MARKER = '[ERROR]';
export const DUMMY_MODE_MARKER = '[DUMMY MODE]';

/**
 * Generates text from a prompt pair. Implementations return a string
 * starting with COMPLETION_ERROR_MARKER on provider failure instead of
 * throwing.
 */
export interface Completer {
  readonly mode: 'remote' | 'dummy';
  complete(systemPrompt: string, userPrompt: string, options?: CallOptions): Promise<string>;
}

/** The slice of the OpenAI client the completer calls. */
export interface ResponsesClient {
  responses: {
    create(
      body: {
        model: string;
        input: Array<{ role: 'system' | 'user'; content: string }>;
        temperature?: number;
        max_output_tokens?: number;
      },
      options?: { signal?: AbortSignal }
    ): PromiseLike<{ output_text: string }>;
  };
}

export interface OpenAICompleterOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  client?: ResponsesClient;
}

export class OpenAICompleter implements Completer {
  readonly mode = 'remote';
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;
  private readonly client: ResponsesClient;

  constructor(options: OpenAICompleterOptions = {}) {
    this.model = options.model ?? DEFAULT_COMPLETION_MODEL;
    this.temperature = options.temperature ?? 0.3;
    this.maxOutputTokens = options.maxOutputTokens ?? 1000;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
  }

  async complete(
    systemPrompt: string,
    userPrompt: string,
    options: CallOptions = {}
  ): Promise<string> {
    try {
      const response = await this.client.responses.create(
        {
          model: this.model,
          input: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          temperature: this.temperature,
          max_output_tokens: this.maxOutputTokens,
        },
        { signal: options.signal }
      );

      const text = response.output_text.trim();
      return text.length > 0
        ? text
        : `${COMPLETION_ERROR_MARKER} LLM returned an empty response.`;
    } catch (error) {
      console.error('Completion error:', error);
      return describeFailure(error, options.signal);
    }
  }
}

/** Offline completer that never calls a remote service. */
export class DummyCompleter implements Completer {
  readonly mode = 'dummy';

  async complete(_systemPrompt: string, userPrompt: string): Promise<string> {
    return `${DUMMY_MODE_MARKER} You asked: '${userPrompt}'. This is a placeholder response.`;
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

function describeFailure(error: unknown, signal?: AbortSignal): string {
  const status = statusOf(error);

  if (status === 429) {
    return `${COMPLETION_ERROR_MARKER} LLM quota exceeded. Enable USE_DUMMY_LLM=true to run in offline mode.`;
  }
  if (status === 401 || status === 403) {
    return `${COMPLETION_ERROR_MARKER} LLM authentication failed.`;
  }
  if (
    signal?.aborted ||
    error instanceof APIConnectionTimeoutError ||
    error instanceof APIUserAbortError
  ) {
    return `${COMPLETION_ERROR_MARKER} LLM request timed out.`;
  }
  if (status !== undefined || error instanceof APIError) {
    return `${COMPLETION_ERROR_MARKER} LLM API failed.`;
  }
  return `${COMPLETION_ERROR_MARKER} LLM service unavailable.`;
}
