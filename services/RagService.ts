import { v4 as uuidv4 } from 'uuid';
import { AuthorizationContext, IngestResult, QueryResult, UploaderIdentity } from '../types';
import { InputError, PartialIngestionError } from '../utils/errors';
import { KeyedLock } from '../utils/KeyedLock';
import { DocumentRecord, DocumentRegistry } from './DatabaseService';
import { IngestionService } from './IngestionService';
import { RetrievalService } from './RetrievalService';
import { VectorStoreService } from './VectorStoreService';

const documentKey = (documentId: string) => `document:${documentId}`;
const ownerKey = (ownerId: string) => `owner:${ownerId}`;

function visibleTo(auth: AuthorizationContext, record: DocumentRecord): boolean {
  return auth.predicate.kind === 'all' || record.ownerId === auth.predicate.ownerId;
}

/**
 * Entry points of the engine. Ingestion and deletion of the same document
 * are serialized, and a user-data wipe waits for that user's in-flight
 * uploads, so a delete can never race an upsert into orphaned vectors.
 */
export class RagService {
  constructor(
    private readonly ingestion: IngestionService,
    private readonly retrieval: RetrievalService,
    private readonly store: VectorStoreService,
    private readonly registry: DocumentRegistry,
    private readonly locks: KeyedLock = new KeyedLock()
  ) {}

  async ingest(text: string, uploader: UploaderIdentity, options: { filename?: string } = {}): Promise<IngestResult> {
    const ownerId = uploader.userId.trim();
    if (ownerId.length === 0) {
      throw new InputError('Cannot ingest a document without an authenticated uploader');
    }
    const documentId = uuidv4();
    const filename = options.filename ?? 'untitled';

    return this.locks.runAll([ownerKey(ownerId), documentKey(documentId)], async () => {
      await this.registry.create(documentId, ownerId, filename);
      try {
        const result = await this.ingestion.ingest({
          text,
          uploader: { userId: ownerId },
          filename,
          documentId
        });
        await this.markIndexedOrRollBack(documentId, result.chunkCount);
        return result;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        await this.registry.markFailed(documentId, reason).catch(registryError => {
          console.error(`[RagService] ERROR: could not mark ${documentId} as failed:`, registryError);
        });
        throw error;
      }
    });
  }

  // The chunks are stored by now; a document the registry cannot record must not stay searchable.
  private async markIndexedOrRollBack(documentId: string, chunkCount: number): Promise<void> {
    try {
      await this.registry.markIndexed(documentId, chunkCount);
    } catch (error) {
      console.error(`[RagService] ERROR: could not mark ${documentId} as indexed:`, error);
      const rolledBack = await this.ingestion.rollback(documentId);
      throw new PartialIngestionError(documentId, rolledBack, error);
    }
  }

  async query(question: string, auth: AuthorizationContext, options: { topK?: number } = {}): Promise<QueryResult> {
    return this.retrieval.query(question, auth, options.topK);
  }

  /** Idempotent: an unknown or already-deleted id succeeds as a no-op. */
  async deleteDocument(documentId: string): Promise<void> {
    await this.locks.run(documentKey(documentId), async () => {
      await this.store.deleteByDocument(documentId);
      await this.registry.remove(documentId);
    });
    console.log(`[RagService] Deleted document ${documentId}`);
  }

  /** Idempotent: removes every vector and registry entry owned by `ownerId`. */
  async deleteUserData(ownerId: string): Promise<void> {
    await this.locks.run(ownerKey(ownerId), async () => {
      await this.store.deleteByOwner(ownerId);
      await this.registry.removeByOwner(ownerId);
    });
    console.log(`[RagService] Deleted all data of user ${ownerId}`);
  }

  async listDocuments(auth: AuthorizationContext): Promise<DocumentRecord[]> {
    return this.registry.list(auth.predicate.kind === 'owner' ? auth.predicate.ownerId : undefined);
  }

  /**
   * Deletes a document on behalf of `auth`. Returns null when the document
   * does not exist or is not visible to the caller.
   */
  async deleteDocumentAs(auth: AuthorizationContext, documentId: string): Promise<DocumentRecord | null> {
    const record = await this.registry.get(documentId);
    if (!record || !visibleTo(auth, record)) {
      return null;
    }
    await this.deleteDocument(documentId);
    return record;
  }

  async stats(): Promise<{ totalDocuments: number; totalVectors: number; totalOwners: number }> {
    const [totalDocuments, totalOwners, vectorStats] = await Promise.all([
      this.registry.count(),
      this.registry.countOwners(),
      this.store.stats()
    ]);
    return { totalDocuments, totalVectors: vectorStats.totalVectors, totalOwners };
  }
}
