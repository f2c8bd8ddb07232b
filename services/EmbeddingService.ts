import { GenerativeModel, GoogleGenerativeAI } from '@google/generative-ai';
import {
  ConfigurationError,
  DimensionMismatchError,
  EmbeddingBatchError,
  EmbeddingTimeoutError,
  EmbeddingUnavailableError,
  RagError
} from '../utils/errors';
import { withTimeout } from '../utils/retry';

/**
 * Converts text into a vector of fixed dimension. Implementations must be
 * deterministic for a given model version.
 */
export interface Embedder {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
  getDimension(): number;
}

export interface EmbeddingServiceOptions {
  apiKey?: string;
  model: string;
  dimension: number;
  timeoutMs: number;
  maxConcurrent: number;
}

function httpStatus(err: Error): number | undefined {
  return 'status' in err && typeof err.status === 'number' ? err.status : undefined;
}

export class EmbeddingService implements Embedder {
  private modelInstance: GenerativeModel;

  constructor(private readonly options: EmbeddingServiceOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('GEMINI_API_KEY is required for embedding generation');
    }
    const genAI = new GoogleGenerativeAI(options.apiKey);
    this.modelInstance = genAI.getGenerativeModel({ model: options.model }, { timeout: options.timeoutMs });
  }

  async embed(text: string): Promise<number[]> {
    let embedding: number[];
    try {
      const result = await withTimeout(
        this.modelInstance.embedContent(text),
        this.options.timeoutMs,
        () => new EmbeddingTimeoutError(this.options.timeoutMs)
      );
      embedding = result.embedding.values;
    } catch (error) {
      throw this.classify(error);
    }

    if (embedding.length !== this.options.dimension) {
      console.error(
        `[EmbeddingService] ERROR: model ${this.options.model} returned ${embedding.length} dimensions, configured ${this.options.dimension}`
      );
      throw new DimensionMismatchError(this.options.dimension, embedding.length);
    }
    return embedding;
  }

  /**
   * Embeds `texts` with bounded concurrency. Output order matches input
   * order. If any input fails, the thrown EmbeddingBatchError names each
   * failing position.
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    const embeddings: Array<number[] | undefined> = new Array(texts.length);
    const failures: Array<{ index: number; error: Error }> = [];
    const maxConcurrent = this.options.maxConcurrent;

    for (let i = 0; i < texts.length; i += maxConcurrent) {
      const slice = texts.slice(i, i + maxConcurrent);
      await Promise.all(
        slice.map(async (text, offset) => {
          const index = i + offset;
          try {
            embeddings[index] = await this.embed(text);
          } catch (error) {
            failures.push({ index, error: error instanceof Error ? error : new Error(String(error)) });
          }
        })
      );
    }

    if (failures.length > 0) {
      failures.sort((a, b) => a.index - b.index);
      console.error(`[EmbeddingService] ${failures.length}/${texts.length} embeddings failed`);
      throw new EmbeddingBatchError(failures, texts.length);
    }

    return embeddings.map((embedding, index) => {
      if (!embedding) {
        throw new EmbeddingBatchError([{ index, error: new Error('missing embedding') }], texts.length);
      }
      return embedding;
    });
  }

  getDimension(): number {
    return this.options.dimension;
  }

  private classify(error: unknown): Error {
    if (error instanceof RagError) {
      return error;
    }
    const err = error instanceof Error ? error : new Error(String(error));
    const status = httpStatus(err);

    if (err.name === 'AbortError' || err.message.includes('aborted') || err.message.includes('timed out')) {
      return new EmbeddingTimeoutError(this.options.timeoutMs);
    }
    if (status !== undefined && (status === 400 || status === 401 || status === 403 || status === 404)) {
      return new ConfigurationError(`Embedding request rejected (${status}): ${err.message}`);
    }
    return new EmbeddingUnavailableError(`Embedding backend unavailable: ${err.message}`, err);
  }
}
