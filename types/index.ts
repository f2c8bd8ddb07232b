/**
 * Metadata stored with every vector. A type alias (not an interface) so it
 * satisfies the vector client's record-metadata index signature.
 */
export type ChunkMetadata = {
  owner_id: string; // set once, from the authenticated uploader
  document_id: string;
  source_filename: string;
  text: string;
  chunk_index: number;
  ingested_at: number; // epoch ms, used for tie-breaking
};

export interface ChunkRecord {
  id: string; // `${document_id}::chunk::${chunk_index}`
  vector: number[];
  metadata: ChunkMetadata;
}

export interface ScoredChunk {
  id: string;
  score: number;
  metadata: ChunkMetadata;
}

/** Closed set of roles. Values match what the identity service issues. */
export const Role = {
  Standard: 'user',
  Privileged: 'admin'
} as const;

export type Role = (typeof Role)[keyof typeof Role];

/** Store-evaluated condition restricting which records may be candidates. */
export type SearchPredicate =
  | { kind: 'owner'; ownerId: string }
  | { kind: 'all' };

export interface AuthorizationContext {
  readonly role: Role;
  readonly subjectId: string;
  readonly predicate: SearchPredicate;
}

export interface UploaderIdentity {
  userId: string;
}

export interface SourceChunk {
  documentId: string;
  ownerId: string;
  sourceFilename: string;
  chunkIndex: number;
  score: number;
  text: string;
}

export interface QueryResult {
  answer: string;
  sourceChunks: SourceChunk[];
  chunksSearched: number;
}

export interface IngestResult {
  documentId: string;
  chunkCount: number;
}
