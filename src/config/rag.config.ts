import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('rag', () => {
  const env = loadEnv();
  return {
    collection: env.RAG_COLLECTION,
    topK: env.RAG_TOP_K,
    maxContextLength: env.RAG_MAX_CONTEXT_LENGTH,
    maxQueryLength: env.RAG_MAX_QUERY_LENGTH,
    retrievalTimeoutMs: env.RAG_RETRIEVAL_TIMEOUT_MS,
    generationTimeoutMs: env.RAG_GENERATION_TIMEOUT_MS,
    chunkSize: env.RAG_CHUNK_SIZE,
    chunkOverlap: env.RAG_CHUNK_OVERLAP,
  };
});
