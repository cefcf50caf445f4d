import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('ai', () => {
  const env = loadEnv();
  return {
    provider: env.AI_PROVIDER,
    maxAttempts: env.AI_MAX_ATTEMPTS,
    embeddingDimension: env.EMBEDDING_DIMENSION,
    maxAnswerTokens: env.RAG_MAX_ANSWER_TOKENS,
    temperature: env.RAG_TEMPERATURE,
    bedrock: {
      region: env.AWS_REGION,
      embeddingModel: env.BEDROCK_EMBEDDING_MODEL,
      chatModel: env.BEDROCK_CHAT_MODEL,
    },
    openai: {
      apiKey: env.OPENAI_API_KEY ?? '',
      baseUrl: env.OPENAI_BASE_URL,
      embeddingModel: env.OPENAI_EMBEDDING_MODEL,
      chatModel: env.OPENAI_MODEL,
    },
  };
});
