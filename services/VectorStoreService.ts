import { ChunkRecord, ScoredChunk, SearchPredicate } from '../types';
import {
  DimensionMismatchError,
  InputError,
  PartialDeletionError,
  PredicateError
} from '../utils/errors';
import { sleep } from '../utils/retry';
import { ChunkIndex, IndexFilter, isEmptyFilter } from './ChunkIndex';

export interface VectorStoreOptions {
  dimension: number;
  deleteVerifyAttempts: number;
  deleteVerifyDelayMs: number;
}

/**
 * The only component allowed to read or write the vector index. Owns the
 * record schema and the translation of authorization predicates into
 * store-side filters.
 */
export class VectorStoreService {
  constructor(
    private readonly index: ChunkIndex,
    private readonly options: VectorStoreOptions
  ) {}

  getDimension(): number {
    return this.options.dimension;
  }

  async upsert(records: ChunkRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    for (const record of records) {
      if (!record.metadata.owner_id) {
        throw new InputError(`Refusing to store record ${record.id} without owner_id`);
      }
      if (!record.metadata.document_id) {
        throw new InputError(`Refusing to store record ${record.id} without document_id`);
      }
      if (record.vector.length !== this.options.dimension) {
        console.error(`[VectorStoreService] ERROR: record ${record.id} has ${record.vector.length} dimensions`);
        throw new DimensionMismatchError(this.options.dimension, record.vector.length);
      }
    }

    await this.index.upsert(records);
  }

  /**
   * Similarity search restricted to records satisfying `predicate`. The
   * predicate becomes part of the index query; there is no unfiltered path.
   * Results come back by descending score, ties by ingestion order.
   */
  async search(queryVector: number[], predicate: SearchPredicate, topK: number): Promise<ScoredChunk[]> {
    if (queryVector.length !== this.options.dimension) {
      throw new DimensionMismatchError(this.options.dimension, queryVector.length);
    }
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new InputError(`topK must be a positive integer, got ${topK}`);
    }

    const filter = this.filterFor(predicate);
    const matches = await this.index.query({ vector: queryVector, topK, filter });

    return [...matches].sort(
      (a, b) =>
        b.score - a.score ||
        a.metadata.ingested_at - b.metadata.ingested_at ||
        a.metadata.document_id.localeCompare(b.metadata.document_id) ||
        a.metadata.chunk_index - b.metadata.chunk_index
    );
  }

  async deleteByDocument(documentId: string): Promise<void> {
    if (!documentId) {
      throw new InputError('deleteByDocument requires a document id');
    }
    await this.deleteVerified({ document_id: { $eq: documentId } }, { documentId });
  }

  async deleteByOwner(ownerId: string): Promise<void> {
    if (!ownerId) {
      throw new InputError('deleteByOwner requires an owner id');
    }
    await this.deleteVerified({ owner_id: { $eq: ownerId } }, { ownerId });
  }

  async countByDocument(documentId: string): Promise<number> {
    return this.index.countWhere({ document_id: { $eq: documentId } });
  }

  async stats(): Promise<{ totalVectors: number }> {
    const description = await this.index.describe();
    return { totalVectors: description.totalRecordCount };
  }

  /**
   * Startup check: the index must have been created for this embedding
   * dimensionality.
   */
  async verifyDimension(): Promise<void> {
    const description = await this.index.describe();
    if (description.dimension !== undefined && description.dimension !== this.options.dimension) {
      throw new DimensionMismatchError(description.dimension, this.options.dimension);
    }
  }

  private filterFor(predicate: SearchPredicate): IndexFilter | undefined {
    switch (predicate.kind) {
      case 'owner':
        if (!predicate.ownerId) {
          throw new PredicateError('Owner predicate without an owner id');
        }
        return { owner_id: { $eq: predicate.ownerId } };
      case 'all':
        return undefined;
      default: {
        const unknown: never = predicate;
        throw new PredicateError(`Unsupported search predicate: ${JSON.stringify(unknown)}`);
      }
    }
  }

  /**
   * Deletes by filter and reports success only once no matching record is
   * left. Stores with eventual consistency get the delete reissued a bounded
   * number of times.
   */
  private async deleteVerified(
    filter: IndexFilter,
    target: { documentId?: string; ownerId?: string }
  ): Promise<void> {
    if (isEmptyFilter(filter)) {
      throw new PredicateError('Refusing to delete with an empty filter');
    }

    await this.index.deleteWhere(filter);

    let remaining = await this.index.countWhere(filter);
    for (let attempt = 1; remaining > 0 && attempt < this.options.deleteVerifyAttempts; attempt++) {
      await sleep(this.options.deleteVerifyDelayMs);
      await this.index.deleteWhere(filter);
      remaining = await this.index.countWhere(filter);
    }

    if (remaining > 0) {
      console.error(`[VectorStoreService] ERROR: deletion left ${remaining} records`, target);
      throw new PartialDeletionError(target, remaining);
    }
  }
}
