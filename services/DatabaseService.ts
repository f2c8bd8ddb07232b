import { Collection, Db, MongoClient } from 'mongodb';

export type DocumentStatus = 'processing' | 'indexed' | 'failed';

export interface DocumentRecord {
  documentId: string;
  ownerId: string;
  filename: string;
  chunkCount: number;
  status: DocumentStatus;
  error?: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Bookkeeping for uploaded documents (listing, ownership checks on delete,
 * admin stats). Vector content lives only in the vector index.
 */
export interface DocumentRegistry {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  create(documentId: string, ownerId: string, filename: string): Promise<DocumentRecord>;
  markIndexed(documentId: string, chunkCount: number): Promise<void>;
  markFailed(documentId: string, error: string): Promise<void>;
  get(documentId: string): Promise<DocumentRecord | null>;
  /** Newest first. Without `ownerId`, every owner's documents. */
  list(ownerId?: string): Promise<DocumentRecord[]>;
  remove(documentId: string): Promise<boolean>;
  removeByOwner(ownerId: string): Promise<number>;
  countOwners(): Promise<number>;
  count(): Promise<number>;
}

export class DatabaseService implements DocumentRegistry {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private documentsCollection: Collection<DocumentRecord> | null = null;
  private isConnected = false;

  constructor(
    private readonly uri: string,
    private readonly databaseName: string
  ) {}

  async connect(): Promise<void> {
    if (this.isConnected && this.db) {
      return;
    }

    this.client = new MongoClient(this.uri);
    await this.client.connect();
    this.db = this.client.db(this.databaseName);
    this.documentsCollection = this.db.collection<DocumentRecord>('documents');
    await this.documentsCollection.createIndex({ documentId: 1 }, { unique: true });
    await this.documentsCollection.createIndex({ ownerId: 1, createdAt: -1 });
    this.isConnected = true;
    console.log(`[DatabaseService] Connected to ${this.databaseName}`);
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.isConnected = false;
      this.db = null;
      this.documentsCollection = null;
    }
  }

  private async documents(): Promise<Collection<DocumentRecord>> {
    if (!this.isConnected) {
      await this.connect();
    }
    if (!this.documentsCollection) throw new Error('Database not initialized');
    return this.documentsCollection;
  }

  async create(documentId: string, ownerId: string, filename: string): Promise<DocumentRecord> {
    const collection = await this.documents();
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
    await collection.insertOne({ ...doc });
    return doc;
  }

  async markIndexed(documentId: string, chunkCount: number): Promise<void> {
    const collection = await this.documents();
    await collection.updateOne(
      { documentId },
      { $set: { status: 'indexed', chunkCount, updatedAt: new Date() }, $unset: { error: '' } }
    );
  }

  async markFailed(documentId: string, error: string): Promise<void> {
    const collection = await this.documents();
    await collection.updateOne({ documentId }, { $set: { status: 'failed', error, updatedAt: new Date() } });
  }

  async get(documentId: string): Promise<DocumentRecord | null> {
    const collection = await this.documents();
    return collection.findOne({ documentId }, { projection: { _id: 0 } });
  }

  async list(ownerId?: string): Promise<DocumentRecord[]> {
    const collection = await this.documents();
    return collection
      .find(ownerId ? { ownerId } : {}, { projection: { _id: 0 } })
      .sort({ createdAt: -1 })
      .toArray();
  }

  async remove(documentId: string): Promise<boolean> {
    const collection = await this.documents();
    const result = await collection.deleteOne({ documentId });
    return result.deletedCount > 0;
  }

  async removeByOwner(ownerId: string): Promise<number> {
    const collection = await this.documents();
    const result = await collection.deleteMany({ ownerId });
    return result.deletedCount;
  }

  async countOwners(): Promise<number> {
    const collection = await this.documents();
    const owners = await collection.distinct('ownerId');
    return owners.length;
  }

  async count(): Promise<number> {
    const collection = await this.documents();
    return collection.countDocuments();
  }
}
