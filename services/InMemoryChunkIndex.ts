import { ChunkRecord, ScoredChunk } from '../types';
import { cosineSimilarity } from '../utils/similarity';
import { ChunkIndex, FilterField, IndexDescription, IndexFilter } from './ChunkIndex';

interface StoredRecord {
  record: ChunkRecord;
  sequence: number;
}

/**
 * Process-local index with cosine scoring. Used by `VECTOR_STORE=memory`
 * and by the test suite.
 */
export class InMemoryChunkIndex implements ChunkIndex {
  private records: Map<string, StoredRecord> = new Map();
  private sequence = 0;

  constructor(private readonly dimension?: number) {}

  async upsert(records: ChunkRecord[]): Promise<void> {
    for (const record of records) {
      this.records.set(record.id, {
        record: { id: record.id, vector: [...record.vector], metadata: { ...record.metadata } },
        sequence: this.sequence++
      });
    }
  }

  async query(params: { vector: number[]; topK: number; filter?: IndexFilter }): Promise<ScoredChunk[]> {
    const { vector, topK, filter } = params;

    const scored: Array<ScoredChunk & { sequence: number }> = [];
    for (const stored of this.records.values()) {
      // Filter first: excluded records are never scored.
      if (filter && !this.matches(stored.record, filter)) continue;
      scored.push({
        id: stored.record.id,
        score: cosineSimilarity(vector, stored.record.vector),
        metadata: { ...stored.record.metadata },
        sequence: stored.sequence
      });
    }

    return scored
      .sort((a, b) => b.score - a.score || a.sequence - b.sequence)
      .slice(0, topK)
      .map(({ id, score, metadata }) => ({ id, score, metadata }));
  }

  async deleteWhere(filter: IndexFilter): Promise<void> {
    for (const [id, stored] of this.records) {
      if (this.matches(stored.record, filter)) {
        this.records.delete(id);
      }
    }
  }

  async countWhere(filter: IndexFilter): Promise<number> {
    let count = 0;
    for (const stored of this.records.values()) {
      if (this.matches(stored.record, filter)) count++;
    }
    return count;
  }

  async describe(): Promise<IndexDescription> {
    return { dimension: this.dimension, totalRecordCount: this.records.size };
  }

  private matches(record: ChunkRecord, filter: IndexFilter): boolean {
    const fields: FilterField[] = ['owner_id', 'document_id'];
    return fields.every(field => {
      const condition = filter[field];
      return condition === undefined || record.metadata[field] === condition.$eq;
    });
  }
}
