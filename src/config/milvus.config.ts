import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('milvus', () => {
  const env = loadEnv();
  return {
    address: env.MILVUS_ENDPOINT,
    token: env.MILVUS_TOKEN,
    timeout: env.MILVUS_TIMEOUT,
    vectorDim: env.EMBEDDING_DIMENSION,
  };
});
