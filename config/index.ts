import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

const int = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const ConfigSchema = z
  .object({
    port: int(8000),
    // Browser origins allowed by CORS in addition to localhost
    corsOrigins: z.array(z.string().url()).default([]),

    gemini: z.object({
      apiKey: z.string().optional(),
      embeddingModel: z.string().default('text-embedding-004'),
      generationModel: z.string().default('gemini-2.5-flash'),
      temperature: z.coerce.number().min(0).max(2).default(0.3),
      maxOutputTokens: int(1024)
    }),

    embedding: z.object({
      // Must match the dimensionality of the vector index
      dimension: int(768),
      timeoutMs: int(60000),
      maxConcurrent: int(8)
    }),

    generation: z.object({
      timeoutMs: int(120000)
    }),

    vectorStore: z.object({
      provider: z.enum(['pinecone', 'memory']).default('pinecone'),
      pineconeApiKey: z.string().optional(),
      indexName: z.string().default('documents'),
      upsertBatchSize: int(100),
      deleteVerifyAttempts: int(5),
      deleteVerifyDelayMs: z.coerce.number().int().nonnegative().default(500)
    }),

    registry: z.object({
      mongoUri: z.string().optional(),
      database: z.string().default('rbac_rag')
    }),

    chunking: z.object({
      chunkSize: int(500),
      overlap: z.coerce.number().int().nonnegative().default(50)
    }),

    retrieval: z.object({
      topK: int(5),
      maxTopK: int(20),
      maxContextChars: int(6000)
    }),

    ingestion: z.object({
      timeoutMs: int(300000),
      maxUploadBytes: int(20 * 1024 * 1024)
    }),

    retry: z.object({
      maxAttempts: int(3),
      baseDelayMs: z.coerce.number().int().nonnegative().default(1000),
      maxDelayMs: z.coerce.number().int().nonnegative().default(10000)
    })
  })
  .superRefine((config, ctx) => {
    if (config.chunking.overlap >= config.chunking.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunking', 'overlap'],
        message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE'
      });
    }
    if (config.retrieval.topK > config.retrieval.maxTopK) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retrieval', 'topK'],
        message: 'TOP_K must not exceed MAX_TOP_K'
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Builds the application configuration from environment variables.
 * Empty strings count as unset so defaults apply.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  const result = ConfigSchema.safeParse({
    port: read('PORT'),
    corsOrigins: read('CORS_ORIGINS')
      ?.split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
    gemini: {
      apiKey: read('GEMINI_API_KEY'),
      embeddingModel: read('EMBEDDING_MODEL'),
      generationModel: read('LLM_MODEL'),
      temperature: read('LLM_TEMPERATURE'),
      maxOutputTokens: read('LLM_MAX_OUTPUT_TOKENS')
    },
    embedding: {
      dimension: read('EMBEDDING_DIMENSION'),
      timeoutMs: read('EMBEDDING_TIMEOUT_MS'),
      maxConcurrent: read('EMBEDDING_MAX_CONCURRENT')
    },
    generation: {
      timeoutMs: read('GENERATION_TIMEOUT_MS')
    },
    vectorStore: {
      provider: read('VECTOR_STORE'),
      pineconeApiKey: read('PINECONE_API_KEY'),
      indexName: read('PINECONE_INDEX_NAME'),
      upsertBatchSize: read('UPSERT_BATCH_SIZE'),
      deleteVerifyAttempts: read('DELETE_VERIFY_ATTEMPTS'),
      deleteVerifyDelayMs: read('DELETE_VERIFY_DELAY_MS')
    },
    registry: {
      mongoUri: read('MONGODB_URI'),
      database: read('MONGODB_DB')
    },
    chunking: {
      chunkSize: read('CHUNK_SIZE'),
      overlap: read('CHUNK_OVERLAP')
    },
    retrieval: {
      topK: read('TOP_K'),
      maxTopK: read('MAX_TOP_K'),
      maxContextChars: read('MAX_CONTEXT_CHARS')
    },
    ingestion: {
      timeoutMs: read('INGEST_TIMEOUT_MS'),
      maxUploadBytes: read('MAX_UPLOAD_BYTES')
    },
    retry: {
      maxAttempts: read('RETRY_MAX_ATTEMPTS'),
      baseDelayMs: read('RETRY_BASE_DELAY_MS'),
      maxDelayMs: read('RETRY_MAX_DELAY_MS')
    }
  });

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}
