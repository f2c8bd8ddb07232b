import { DocumentRecord, DocumentRegistry } from './DatabaseService';

export class InMemoryDocumentRegistry implements DocumentRegistry {
  private documents: Map<string, DocumentRecord> = new Map();

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async create(documentId: string, ownerId: string, filename: string): Promise<DocumentRecord> {
    if (this.documents.has(documentId)) {
      throw new Error(`Document ${documentId} already registered`);
    }
    const now = new Date();
    const doc: DocumentRecord = {
      documentId,
      ownerId,
      filename,
      chunkCount: 0,
      status: 'processing',
      createdAt: now,
      updatedAt: now
    };
    this.documents.set(documentId, doc);
    return { ...doc };
  }

  async markIndexed(documentId: string, chunkCount: number): Promise<void> {
    const doc = this.documents.get(documentId);
    if (!doc) return;
    this.documents.set(documentId, { ...doc, status: 'indexed', chunkCount, error: undefined, updatedAt: new Date() });
  }

  async markFailed(documentId: string, error: string): Promise<void> {
    const doc = this.documents.get(documentId);
    if (!doc) return;
    this.documents.set(documentId, { ...doc, status: 'failed', error, updatedAt: new Date() });
  }

  async get(documentId: string): Promise<DocumentRecord | null> {
    const doc = this.documents.get(documentId);
    return doc ? { ...doc } : null;
  }

  async list(ownerId?: string): Promise<DocumentRecord[]> {
    // Map iteration is insertion order; reverse for newest first.
    return [...this.documents.values()]
      .filter(doc => ownerId === undefined || doc.ownerId === ownerId)
      .reverse()
      .map(doc => ({ ...doc }));
  }

  async remove(documentId: string): Promise<boolean> {
    return this.documents.delete(documentId);
  }

  async removeByOwner(ownerId: string): Promise<number> {
    let removed = 0;
    for (const [id, doc] of this.documents) {
      if (doc.ownerId === ownerId) {
        this.documents.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async countOwners(): Promise<number> {
    return new Set([...this.documents.values()].map(doc => doc.ownerId)).size;
  }

  async count(): Promise<number> {
    return this.documents.size;
  }
}
