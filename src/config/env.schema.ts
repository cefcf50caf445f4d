import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((val) => val === 'true');

export const envSchema = z
  .object({
    // Application
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

    // Model provider
    AI_PROVIDER: z.enum(['bedrock', 'openai']).default('bedrock'),
    AI_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    AWS_REGION: z.string().default('us-east-1'),
    BEDROCK_EMBEDDING_MODEL: z.string().default('amazon.titan-embed-text-v1'),
    BEDROCK_CHAT_MODEL: z.string().default('anthropic.claude-v2'),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(1536),

    // RAG Pipeline Configuration
    RAG_TOP_K: z.coerce.number().int().min(1).max(100).default(5),
    RAG_MAX_CONTEXT_LENGTH: z.coerce.number().int().positive().default(8000),
    RAG_MAX_QUERY_LENGTH: z.coerce.number().int().positive().default(2000),
    RAG_MAX_ANSWER_TOKENS: z.coerce.number().int().positive().default(500),
    RAG_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.2),
    RAG_RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    RAG_GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(500),
    RAG_CHUNK_OVERLAP: z.coerce.number().int().min(0).default(0),
    RAG_COLLECTION: z.string().regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/).default('cert_embeddings'),

    // Milvus / Zilliz Cloud
    MILVUS_ENDPOINT: z.string().default('http://localhost:19530'),
    MILVUS_TOKEN: z.string().default(''),
    MILVUS_TIMEOUT: z.coerce.number().int().positive().default(60000),

    // Kafka
    KAFKA_BROKER: z.string().default('localhost:9092'),
    KAFKA_CLIENT_ID: z.string().default('study-assistant'),
    KAFKA_CONSUMER_GROUP_ID: z.string().default('study-assistant-ingestion'),

    // MinIO Configuration
    MINIO_ENDPOINT: z.string(),
    MINIO_PORT: z.coerce.number().int().positive(),
    MINIO_USE_SSL: booleanString,
    MINIO_ACCESS_KEY: z.string(),
    MINIO_SECRET_KEY: z.string(),
    MINIO_BUCKET: z.string(),
  })
  .superRefine((env, ctx) => {
    if (env.AI_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY is required when AI_PROVIDER is openai',
      });
    }
    if (env.RAG_CHUNK_OVERLAP >= env.RAG_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RAG_CHUNK_OVERLAP'],
        message: 'RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    throw new Error(`Environment validation failed: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Parses the current process environment. Namespaced config factories read
 * through this so they see the same defaults and coercions as boot validation.
 */
export function loadEnv(): Env {
  return validateEnv(process.env);
}
