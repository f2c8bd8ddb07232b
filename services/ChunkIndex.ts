import { ChunkMetadata, ChunkRecord, ScoredChunk } from '../types';

export type FilterField = 'owner_id' | 'document_id';

/**
 * Metadata filter evaluated by the index during candidate selection.
 * Same shape as the Pinecone filter language, restricted to equality.
 */
export type IndexFilter = { [K in FilterField]?: { $eq: ChunkMetadata[K] } };

export interface IndexDescription {
  dimension?: number;
  totalRecordCount: number;
}

/**
 * Low-level vector index client. Only VectorStoreService talks to it.
 */
export interface ChunkIndex {
  upsert(records: ChunkRecord[]): Promise<void>;
  /** `filter` undefined means every record is a candidate. */
  query(params: { vector: number[]; topK: number; filter?: IndexFilter }): Promise<ScoredChunk[]>;
  deleteWhere(filter: IndexFilter): Promise<void>;
  countWhere(filter: IndexFilter): Promise<number>;
  describe(): Promise<IndexDescription>;
}

export function isEmptyFilter(filter: IndexFilter): boolean {
  return Object.values(filter).every(condition => condition === undefined);
}
