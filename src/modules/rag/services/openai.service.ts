import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { CreateEmbeddingResponse, EmbeddingCreateParams } from 'openai/resources/embeddings';
import aiConfig from '../../../config/ai.config';
import { ChatPrompt, CompletionOptions, ModelProvider } from '../types';

/**
 * The calls this service makes on the OpenAI client.
 */
export interface OpenAIClient {
    embeddings: {
        create(body: EmbeddingCreateParams, options?: { signal?: AbortSignal }): PromiseLike<CreateEmbeddingResponse>;
    };
    chat: {
        completions: {
            create(body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }): PromiseLike<ChatCompletion>;
        };
    };
}

/**
 * OpenAI Service - Native OpenAI SDK Integration
 */
export class OpenAIService implements ModelProvider {
    private readonly logger = new Logger(OpenAIService.name);
    private readonly client: OpenAIClient;
    readonly embeddingModel: string;
    readonly chatModel: string;
    private readonly embeddingDimension: number;

    constructor(config: ConfigType<typeof aiConfig>, client?: OpenAIClient) {
        if (!config.openai.apiKey && !client) {
            throw new Error('OPENAI_API_KEY environment variable is not set');
        }

        this.embeddingModel = config.openai.embeddingModel;
        this.chatModel = config.openai.chatModel;
        this.embeddingDimension = config.embeddingDimension;

        this.client = client ?? new OpenAI({
            apiKey: config.openai.apiKey,
            baseURL: config.openai.baseUrl,
            // The SDK counts retries, not attempts.
            maxRetries: config.maxAttempts - 1,
        });

        this.logger.log(`✅ OpenAI client initialized`);
        this.logger.log(`📊 Embedding model: ${this.embeddingModel}`);
        this.logger.log(`💬 Chat model: ${this.chatModel}`);
    }

    /**
     * Generate embedding for text
     */
    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
        this.logger.debug(`🔄 Generating embedding for text (${text.length} chars)`);

        const response = await this.client.embeddings.create(
            {
                model: this.embeddingModel,
                input: text,
                encoding_format: 'float',
                // Only the text-embedding-3 family accepts a custom size.
                ...(this.embeddingModel.startsWith('text-embedding-3') ? { dimensions: this.embeddingDimension } : {}),
            },
            { signal },
        );

        const embedding = response.data[0]?.embedding;
        if (!embedding) {
            throw new Error('OpenAI returned no embedding');
        }
        if (embedding.length !== this.embeddingDimension) {
            throw new Error(
                `Embedding dimension mismatch: expected ${this.embeddingDimension}, got ${embedding.length}`,
            );
        }

        this.logger.debug(`✅ Embedding generated (${embedding.length} dimensions)`);
        return embedding;
    }

    /**
     * Generate chat response
     */
    async complete(prompt: ChatPrompt, options: CompletionOptions): Promise<string> {
        this.logger.debug(`💬 Generating chat response with ${this.chatModel}`);

        const response = await this.client.chat.completions.create(
            {
                model: this.chatModel,
                messages: [
                    { role: 'system', content: prompt.system },
                    { role: 'user', content: prompt.user },
                ],
                temperature: options.temperature,
                max_tokens: options.maxTokens,
            },
            { signal: options.signal },
        );

        const choice = response.choices[0];
        if (!choice) {
            throw new Error('OpenAI returned no choices');
        }
        if (choice.finish_reason === 'content_filter') {
            throw new Error('Answer was blocked by the content policy');
        }

        this.logger.debug(`📊 Tokens used: ${response.usage?.total_tokens ?? 0}`);
        return choice.message.content ?? '';
    }
}
