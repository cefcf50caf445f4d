import { FactoryProvider } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import aiConfig from '../../config/ai.config';
import { MODEL_PROVIDER } from './rag.constants';
import { BedrockService } from './services/bedrock.service';
import { OpenAIService } from './services/openai.service';
import { ModelProvider } from './types';

export function createModelProvider(config: ConfigType<typeof aiConfig>): ModelProvider {
  switch (config.provider) {
    case 'openai':
      return new OpenAIService(config);
    case 'bedrock':
      return new BedrockService(config);
  }
}

/**
 * Embedding and chat backend, chosen once at boot from AI_PROVIDER.
 */
export const modelProvider: FactoryProvider<ModelProvider> = {
  provide: MODEL_PROVIDER,
  inject: [aiConfig.KEY],
  useFactory: createModelProvider,
};
