import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('kafka', () => {
  const env = loadEnv();
  return {
    broker: env.KAFKA_BROKER,
    clientId: env.KAFKA_CLIENT_ID,
    consumerGroupId: env.KAFKA_CONSUMER_GROUP_ID,
  };
});
