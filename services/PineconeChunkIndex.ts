import { Index, Pinecone } from '@pinecone-database/pinecone';
import { ChunkMetadata, ChunkRecord, ScoredChunk } from '../types';
import { StoreUnavailableError } from '../utils/errors';
import { ChunkIndex, IndexDescription, IndexFilter } from './ChunkIndex';

const TRANSIENT_ERROR_NAMES = new Set([
  'PineconeConnectionError',
  'PineconeUnavailableError',
  'PineconeInternalServerError',
  'PineconeUnmappedHttpError'
]);

function isTransient(err: Error): boolean {
  return (
    TRANSIENT_ERROR_NAMES.has(err.name) ||
    err.message.includes('fetch failed') ||
    err.message.includes('ECONNRESET') ||
    err.message.includes('ECONNREFUSED') ||
    err.message.includes('ETIMEDOUT') ||
    err.message.includes('network')
  );
}

// Largest topK a Pinecone query accepts.
const MAX_QUERY_TOP_K = 10000;

/**
 * Pinecone-backed chunk index. Filters are sent with the query so Pinecone
 * applies them during candidate selection.
 */
export class PineconeChunkIndex implements ChunkIndex {
  private index: Index<ChunkMetadata>;
  private probe: number[];

  constructor(apiKey: string, indexName: string, dimension: number) {
    const pinecone = new Pinecone({ apiKey });
    this.index = pinecone.index<ChunkMetadata>(indexName);
    this.probe = new Array<number>(dimension).fill(0);
    this.probe[0] = 1;
  }

  async upsert(records: ChunkRecord[]): Promise<void> {
    await this.call('upsert', () =>
      this.index.upsert(
        records.map(record => ({
          id: record.id,
          values: record.vector,
          metadata: record.metadata
        }))
      )
    );
  }

  async query(params: { vector: number[]; topK: number; filter?: IndexFilter }): Promise<ScoredChunk[]> {
    const response = await this.call('query', () =>
      this.index.query({
        vector: params.vector,
        topK: params.topK,
        includeMetadata: true,
        includeValues: false,
        ...(params.filter ? { filter: params.filter } : {})
      })
    );

    return (response.matches ?? []).map(match => {
      if (!match.metadata) {
        throw new Error(`Record ${match.id} has no metadata`);
      }
      return { id: match.id, score: match.score ?? 0, metadata: match.metadata };
    });
  }

  async deleteWhere(filter: IndexFilter): Promise<void> {
    await this.call('delete', () => this.index.deleteMany(filter));
  }

  /**
   * Serverless indexes do not filter index stats, so matching records are
   * counted with a filtered query instead. Counts saturate at MAX_QUERY_TOP_K,
   * which is enough to tell whether a delete left anything behind.
   */
  async countWhere(filter: IndexFilter): Promise<number> {
    const response = await this.call('count', () =>
      this.index.query({
        vector: this.probe,
        topK: MAX_QUERY_TOP_K,
        filter,
        includeMetadata: false,
        includeValues: false
      })
    );
    return (response.matches ?? []).length;
  }

  async describe(): Promise<IndexDescription> {
    const stats = await this.call('describe', () => this.index.describeIndexStats());
    return { dimension: stats.dimension, totalRecordCount: stats.totalRecordCount ?? 0 };
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      console.error(`[PineconeChunkIndex] ERROR: ${operation} failed:`, err.message);
      if (isTransient(err)) {
        throw new StoreUnavailableError(`Pinecone ${operation} failed: ${err.message}`, err);
      }
      throw new Error(`Pinecone ${operation} failed: ${err.message}`, { cause: err });
    }
  }
}
