import { AuthorizationContext, QueryResult, ScoredChunk, SourceChunk } from '../types';
import { InputError } from '../utils/errors';
import { RetryOptions, withRetry } from '../utils/retry';
import { Embedder } from './EmbeddingService';
import { Generator } from './GenerationService';
import { VectorStoreService } from './VectorStoreService';

export interface RetrievalOptions {
  topK: number;
  maxTopK: number;
  maxContextChars: number;
  retry: Omit<RetryOptions, 'label'>;
}

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

/**
 * Joins chunk texts in the given order until the character budget is used.
 * A first chunk larger than the whole budget is truncated rather than dropped.
 * Returns the context and the chunks that actually made it in.
 */
export function assembleContext(
  chunks: ScoredChunk[],
  maxChars: number
): { context: string; used: ScoredChunk[] } {
  const parts: string[] = [];
  const used: ScoredChunk[] = [];
  let length = 0;

  for (const chunk of chunks) {
    const text = chunk.metadata.text;
    const addition = (parts.length > 0 ? CONTEXT_SEPARATOR.length : 0) + text.length;

    if (length + addition > maxChars) {
      if (parts.length === 0) {
        parts.push(text.slice(0, maxChars));
        used.push(chunk);
      }
      break;
    }
    parts.push(text);
    used.push(chunk);
    length += addition;
  }

  return { context: parts.join(CONTEXT_SEPARATOR), used };
}

export class RetrievalService {
  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStoreService,
    private readonly generator: Generator,
    private readonly options: RetrievalOptions
  ) {}

  /**
   * Answers `question` using only chunks the caller may see. The
   * authorization context must already be resolved from the verified
   * identity; its predicate goes to the store untouched.
   */
  async query(question: string, auth: AuthorizationContext, topK?: number): Promise<QueryResult> {
    const trimmed = question.trim();
    if (trimmed.length === 0) {
      throw new InputError('Question must not be empty');
    }
    const limit = this.resolveTopK(topK);

    const queryVector = await withRetry(() => this.embedder.embed(trimmed), {
      ...this.options.retry,
      label: 'embed query'
    });

    const matches = await withRetry(() => this.store.search(queryVector, auth.predicate, limit), {
      ...this.options.retry,
      label: 'vector search'
    });

    if (matches.length === 0) {
      console.log(`[RetrievalService] No accessible chunks matched for subject ${auth.subjectId} (${auth.role})`);
    }

    const { context, used } = assembleContext(matches, this.options.maxContextChars);

    const answer = await withRetry(() => this.generator.generate({ question: trimmed, context }), {
      ...this.options.retry,
      label: 'generate answer'
    });

    return {
      answer,
      sourceChunks: used.map(toSourceChunk),
      chunksSearched: matches.length
    };
  }

  private resolveTopK(topK: number | undefined): number {
    if (topK === undefined) {
      return this.options.topK;
    }
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new InputError(`top_k must be a positive integer, got ${topK}`);
    }
    return Math.min(topK, this.options.maxTopK);
  }
}

function toSourceChunk(chunk: ScoredChunk): SourceChunk {
  return {
    documentId: chunk.metadata.document_id,
    ownerId: chunk.metadata.owner_id,
    sourceFilename: chunk.metadata.source_filename,
    chunkIndex: chunk.metadata.chunk_index,
    score: Math.round(chunk.score * 10000) / 10000,
    text: chunk.metadata.text
  };
}
