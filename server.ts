import dotenv from 'dotenv';
import { createApp } from './app';
import { AppConfig, loadConfig } from './config';
import { ChunkIndex } from './services/ChunkIndex';
import { ChunkingService } from './services/ChunkingService';
import { DatabaseService, DocumentRegistry } from './services/DatabaseService';
import { EmbeddingService } from './services/EmbeddingService';
import { GenerationService } from './services/GenerationService';
import { InMemoryChunkIndex } from './services/InMemoryChunkIndex';
import { InMemoryDocumentRegistry } from './services/InMemoryDocumentRegistry';
import { IngestionService } from './services/IngestionService';
import { PineconeChunkIndex } from './services/PineconeChunkIndex';
import { RagService } from './services/RagService';
import { RetrievalService } from './services/RetrievalService';
import { TextCleaningService } from './services/TextCleaningService';
import { TextExtractionService } from './services/TextExtractionService';
import { VectorStoreService } from './services/VectorStoreService';
import { ConfigurationError } from './utils/errors';

dotenv.config();

function createChunkIndex(config: AppConfig): ChunkIndex {
  if (config.vectorStore.provider === 'memory') {
    console.warn('[Server] WARNING: using the in-memory vector index; data is lost on restart');
    return new InMemoryChunkIndex(config.embedding.dimension);
  }
  if (!config.vectorStore.pineconeApiKey) {
    throw new ConfigurationError('PINECONE_API_KEY is required when VECTOR_STORE=pinecone');
  }
  return new PineconeChunkIndex(
    config.vectorStore.pineconeApiKey,
    config.vectorStore.indexName,
    config.embedding.dimension
  );
}

function createRegistry(config: AppConfig): DocumentRegistry {
  if (config.registry.mongoUri) {
    return new DatabaseService(config.registry.mongoUri, config.registry.database);
  }
  console.warn('[Server] WARNING: MONGODB_URI is not set; document registry is in-memory');
  return new InMemoryDocumentRegistry();
}

export function buildServices(config: AppConfig): { rag: RagService; store: VectorStoreService; registry: DocumentRegistry } {
  const retry = config.retry;
  const store = new VectorStoreService(createChunkIndex(config), {
    dimension: config.embedding.dimension,
    deleteVerifyAttempts: config.vectorStore.deleteVerifyAttempts,
    deleteVerifyDelayMs: config.vectorStore.deleteVerifyDelayMs
  });
  const embedder = new EmbeddingService({
    apiKey: config.gemini.apiKey,
    model: config.gemini.embeddingModel,
    dimension: config.embedding.dimension,
    timeoutMs: config.embedding.timeoutMs,
    maxConcurrent: config.embedding.maxConcurrent
  });
  const generator = new GenerationService({
    apiKey: config.gemini.apiKey,
    model: config.gemini.generationModel,
    temperature: config.gemini.temperature,
    maxOutputTokens: config.gemini.maxOutputTokens,
    timeoutMs: config.generation.timeoutMs
  });

  const ingestion = new IngestionService(
    new ChunkingService({ chunkSize: config.chunking.chunkSize, overlap: config.chunking.overlap }),
    new TextCleaningService(),
    embedder,
    store,
    { upsertBatchSize: config.vectorStore.upsertBatchSize, timeoutMs: config.ingestion.timeoutMs, retry }
  );
  const retrieval = new RetrievalService(embedder, store, generator, {
    topK: config.retrieval.topK,
    maxTopK: config.retrieval.maxTopK,
    maxContextChars: config.retrieval.maxContextChars,
    retry
  });
  const registry = createRegistry(config);

  return { rag: new RagService(ingestion, retrieval, store, registry), store, registry };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const { rag, store, registry } = buildServices(config);

  await store.verifyDimension();
  await registry.connect();

  const app = createApp({
    rag,
    extractor: new TextExtractionService(),
    maxUploadBytes: config.ingestion.maxUploadBytes,
    corsOrigins: config.corsOrigins
  });

  const server = app.listen(config.port, () => {
    console.log(`[Server] Server started on port ${config.port}`);
    console.log(`[Server] Health check available at http://localhost:${config.port}/api/health`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close(() => {
      registry
        .disconnect()
        .catch(err => console.error('[Server] ERROR: registry disconnect failed:', err))
        .finally(() => process.exit(0));
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  main().catch(err => {
    console.error('[Server] ERROR: startup failed:', err);
    process.exit(1);
  });
}
