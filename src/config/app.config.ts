import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('app', () => {
  const env = loadEnv();
  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
  };
});
