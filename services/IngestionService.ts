import { v4 as uuidv4 } from 'uuid';
import { ChunkRecord, IngestResult, UploaderIdentity } from '../types';
import {
  EmbeddingBatchError,
  EmptyDocumentError,
  IngestionTimeoutError,
  InputError,
  PartialIngestionError
} from '../utils/errors';
import { RetryOptions, withRetry } from '../utils/retry';
import { ChunkingService } from './ChunkingService';
import { Embedder } from './EmbeddingService';
import { TextCleaningService } from './TextCleaningService';
import { VectorStoreService } from './VectorStoreService';

export interface IngestionOptions {
  upsertBatchSize: number;
  timeoutMs: number;
  retry: Omit<RetryOptions, 'label'>;
}

export interface IngestParams {
  text: string;
  /** Authenticated uploader. The only source of owner_id. */
  uploader: UploaderIdentity;
  filename?: string;
  /** Pre-allocated id; a fresh UUID is generated when omitted. */
  documentId?: string;
}

export class IngestionService {
  constructor(
    private readonly chunker: ChunkingService,
    private readonly textCleaner: TextCleaningService,
    private readonly embedder: Embedder,
    private readonly store: VectorStoreService,
    private readonly options: IngestionOptions
  ) {}

  /**
   * Chunks, embeds and stores a document. Either every chunk ends up stored
   * under the uploader's owner_id, or none does: any failure after the first
   * write deletes what was written for the document before reporting.
   */
  async ingest(params: IngestParams): Promise<IngestResult> {
    const ownerId = params.uploader.userId.trim();
    if (ownerId.length === 0) {
      throw new InputError('Cannot ingest a document without an authenticated uploader');
    }
    if (params.text.trim().length === 0) {
      throw new EmptyDocumentError();
    }

    const documentId = params.documentId ?? uuidv4();
    const sourceFilename = params.filename ?? 'untitled';
    const cleanedText = this.textCleaner.cleanText(params.text);
    const ingestedAt = Date.now();
    const deadline = ingestedAt + this.options.timeoutMs;

    console.log(`[IngestionService] Starting ingestion - Doc ID: ${documentId}, owner: ${ownerId}`);

    let chunkCount = 0;
    let pending: string[] = [];

    // Embeds and stores one batch of chunk texts; chunk_index continues across batches.
    const flush = async () => {
      if (pending.length === 0) return;
      const texts = pending;
      pending = [];
      if (Date.now() > deadline) {
        throw new IngestionTimeoutError(this.options.timeoutMs);
      }

      const firstIndex = chunkCount;
      let vectors: number[][];
      try {
        vectors = await withRetry(() => this.embedder.embedBatch(texts), {
          ...this.options.retry,
          label: `embed ${documentId} chunks ${firstIndex}-${firstIndex + texts.length - 1}`
        });
      } catch (error) {
        if (error instanceof EmbeddingBatchError) {
          const failed = error.failures.map(f => firstIndex + f.index);
          console.error(`[IngestionService] ERROR: embedding failed for ${documentId} chunks ${failed.join(', ')}`);
        }
        throw error;
      }

      const records: ChunkRecord[] = texts.map((text, offset) => ({
        id: `${documentId}::chunk::${firstIndex + offset}`,
        vector: vectors[offset],
        metadata: {
          owner_id: ownerId,
          document_id: documentId,
          source_filename: sourceFilename,
          text,
          chunk_index: firstIndex + offset,
          ingested_at: ingestedAt
        }
      }));
      chunkCount += records.length;

      await withRetry(() => this.store.upsert(records), {
        ...this.options.retry,
        label: `upsert ${documentId}`
      });
    };

    try {
      let seen = 0;
      for (const chunk of this.chunker.chunkText(cleanedText)) {
        if (chunk.text.trim().length === 0) continue;
        seen++;
        pending.push(chunk.text);
        if (pending.length >= this.options.upsertBatchSize) {
          await flush();
        }
      }

      if (seen === 0) {
        throw new EmptyDocumentError('Document produced no chunks after processing');
      }
      await flush();
    } catch (error) {
      if (error instanceof EmptyDocumentError) {
        throw error;
      }
      console.error(`[IngestionService] ERROR ingesting ${documentId} after ${chunkCount} chunks:`, error);
      const rolledBack = await this.rollback(documentId);
      throw new PartialIngestionError(documentId, rolledBack, error);
    }

    console.log(`[IngestionService] Ingestion completed - ${documentId}: ${chunkCount} chunks`);
    return { documentId, chunkCount };
  }

  /** Removes every stored chunk of the document. Resolves false if that could not be confirmed. */
  async rollback(documentId: string): Promise<boolean> {
    try {
      await withRetry(() => this.store.deleteByDocument(documentId), {
        ...this.options.retry,
        label: `rollback ${documentId}`
      });
      console.warn(`[IngestionService] Rolled back partial document ${documentId}`);
      return true;
    } catch (error) {
      console.error(`[IngestionService] ERROR: rollback of ${documentId} failed:`, error);
      return false;
    }
  }
}
