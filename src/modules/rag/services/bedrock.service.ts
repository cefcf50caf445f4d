import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import aiConfig from '../../../config/ai.config';
import { ChatPrompt, CompletionOptions, ModelProvider } from '../types';

const titanEmbeddingResponse = z.object({
    embedding: z.array(z.number()),
});

const anthropicMessagesResponse = z.object({
    content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
    stop_reason: z.string().nullish(),
});

const titanTextResponse = z.object({
    results: z.array(z.object({ outputText: z.string(), completionReason: z.string().nullish() })).min(1),
});

/**
 * The call this service makes on the Bedrock runtime client.
 */
export interface BedrockClient {
    send(
        command: InvokeModelCommand,
        options?: { abortSignal?: AbortSignal },
    ): Promise<{ body: { transformToString(): string | Promise<string> } }>;
}

/**
 * Bedrock Service - Titan embeddings plus Claude or Titan text generation
 */
export class BedrockService implements ModelProvider {
    private readonly logger = new Logger(BedrockService.name);
    private readonly client: BedrockClient;
    readonly embeddingModel: string;
    readonly chatModel: string;
    private readonly embeddingDimension: number;

    constructor(config: ConfigType<typeof aiConfig>, client?: BedrockClient) {
        this.embeddingModel = config.bedrock.embeddingModel;
        this.chatModel = config.bedrock.chatModel;
        this.embeddingDimension = config.embeddingDimension;

        this.client = client ?? new BedrockRuntimeClient({
            region: config.bedrock.region,
            maxAttempts: config.maxAttempts,
            retryMode: 'standard',
        });

        this.logger.log(`✅ Bedrock client initialized (${config.bedrock.region})`);
        this.logger.log(`📊 Embedding model: ${this.embeddingModel}`);
        this.logger.log(`💬 Chat model: ${this.chatModel}`);
    }

    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
        this.logger.debug(`🔄 Generating embedding for text (${text.length} chars)`);

        // Titan v2 takes an output size; v1 is fixed at 1536.
        const body = this.embeddingModel.startsWith('amazon.titan-embed-text-v2')
            ? { inputText: text, dimensions: this.embeddingDimension, normalize: true }
            : { inputText: text };

        const payload = await this.invoke(this.embeddingModel, body, signal);
        const { embedding } = titanEmbeddingResponse.parse(payload);

        if (embedding.length !== this.embeddingDimension) {
            throw new Error(
                `Embedding dimension mismatch: expected ${this.embeddingDimension}, got ${embedding.length}`,
            );
        }
        return embedding;
    }

    async complete(prompt: ChatPrompt, options: CompletionOptions): Promise<string> {
        this.logger.debug(`💬 Generating chat response with ${this.chatModel}`);

        if (this.chatModel.includes('anthropic.')) {
            const payload = await this.invoke(
                this.chatModel,
                {
                    anthropic_version: 'bedrock-2023-05-31',
                    max_tokens: options.maxTokens,
                    temperature: options.temperature,
                    system: prompt.system,
                    messages: [{ role: 'user', content: prompt.user }],
                },
                options.signal,
            );
            const response = anthropicMessagesResponse.parse(payload);
            return response.content.map((part) => part.text ?? '').join('');
        }

        if (this.chatModel.startsWith('amazon.titan-text')) {
            const payload = await this.invoke(
                this.chatModel,
                {
                    inputText: `${prompt.system}\n\n${prompt.user}`,
                    textGenerationConfig: {
                        maxTokenCount: options.maxTokens,
                        temperature: options.temperature,
                    },
                },
                options.signal,
            );
            const [result] = titanTextResponse.parse(payload).results;
            if (result.completionReason === 'CONTENT_FILTERED') {
                throw new Error('Answer was blocked by the content policy');
            }
            return result.outputText;
        }

        throw new Error(`Unsupported Bedrock chat model: ${this.chatModel}`);
    }

    private async invoke(modelId: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
        const command = new InvokeModelCommand({
            modelId,
            contentType: 'application/json',
            accept: 'application/json',
            body: JSON.stringify(body),
        });

        const response = await this.client.send(command, { abortSignal: signal });
        const raw: unknown = JSON.parse(await response.body.transformToString());
        return raw;
    }
}
