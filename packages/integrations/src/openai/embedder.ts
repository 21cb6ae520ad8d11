import OpenAI from 'openai';
import {
  ok,
  err,
  type Result,
  withRetry,
  retryPresets,
  type CircuitBreaker,
  createCircuitBreaker,
  circuitBreakerPresets,
  isCircuitOpenError,
} from '@mailpilot/utils';
import { IntegrationErrorCode, type IntegrationError } from '../types.js';

// Inputs beyond this are cut before embedding
const MAX_INPUT_CHARS = 32000;

export type EmbedFn = (input: string) => Promise<number[]>;

export interface OpenAIEmbedderOptions {
  apiKey: string;
  model?: string;
  dimension?: number;
  embed?: EmbedFn;
  circuitBreaker?: CircuitBreaker;
}

export function createOpenAIEmbed(apiKey: string, model: string, dimension: number): EmbedFn {
  const client = new OpenAI({ apiKey });
  // Only the text-embedding-3 family accepts a requested dimension
  const dimensions = model.startsWith('text-embedding-3') ? dimension : undefined;

  return async (input) => {
    const response = await client.embeddings.create({
      model,
      input,
      ...(dimensions !== undefined ? { dimensions } : {}),
    });
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error('No embedding in response');
    }
    return embedding;
  };
}

/**
 * Text embeddings with a fixed dimension. A vector of any other length is
 * reported as INVALID_RESPONSE instead of being passed on.
 */
export class OpenAIEmbedder {
  readonly dimension: number;
  readonly model: string;
  private readonly embedFn: EmbedFn;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(options: OpenAIEmbedderOptions) {
    this.model = options.model ?? 'text-embedding-3-small';
    this.dimension = options.dimension ?? 1536;
    this.embedFn = options.embed ?? createOpenAIEmbed(options.apiKey, this.model, this.dimension);
    this.circuitBreaker =
      options.circuitBreaker ?? createCircuitBreaker('openai', circuitBreakerPresets.openai);
  }

  async embed(text: string): Promise<Result<number[], IntegrationError>> {
    const input = text.slice(0, MAX_INPUT_CHARS);

    const cbResult = await this.circuitBreaker.execute(async () => {
      const result = await withRetry(() => this.embedFn(input), retryPresets.embedding);
      if (!result.ok) {
        throw new Error(result.error.message);
      }
      return result.value;
    });

    if (!cbResult.ok) {
      const error = cbResult.error;
      return err({
        code: isCircuitOpenError(error)
          ? IntegrationErrorCode.CIRCUIT_OPEN
          : IntegrationErrorCode.EMBEDDING_ERROR,
        message: error.message,
        retryable: true,
      });
    }

    const vector = cbResult.value;
    if (vector.length !== this.dimension) {
      return err({
        code: IntegrationErrorCode.INVALID_RESPONSE,
        message: `Embedding has dimension ${vector.length}, expected ${this.dimension}`,
        retryable: false,
      });
    }
    return ok(vector);
  }
}
