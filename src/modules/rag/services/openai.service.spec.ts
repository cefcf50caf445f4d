import { ConfigType } from '@nestjs/config';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { CreateEmbeddingResponse, EmbeddingCreateParams } from 'openai/resources/embeddings';
import aiConfig from '../../../config/ai.config';
import { OpenAIClient, OpenAIService } from './openai.service';

type RequestOptions = { signal?: AbortSignal };

const config: ConfigType<typeof aiConfig> = {
    provider: 'openai',
    maxAttempts: 1,
    embeddingDimension: 3,
    maxAnswerTokens: 256,
    temperature: 0.1,
    bedrock: { region: 'us-east-1', embeddingModel: 'amazon.titan-embed-text-v1', chatModel: 'anthropic.claude-v2' },
    openai: { apiKey: 'test-key', baseUrl: 'https://api.openai.com/v1', embeddingModel: 'text-embedding-3-small', chatModel: 'gpt-4o-mini' },
};

function embeddingResponse(embedding: number[]): CreateEmbeddingResponse {
    return {
        object: 'list',
        model: 'text-embedding-3-small',
        data: [{ object: 'embedding', index: 0, embedding }],
        usage: { prompt_tokens: 4, total_tokens: 4 },
    };
}

function completion(content: string | null, finishReason: ChatCompletion.Choice['finish_reason']): ChatCompletion {
    return {
        id: 'chatcmpl-test',
        object: 'chat.completion',
        created: 1700000000,
        model: 'gpt-4o-mini',
        choices: [{ index: 0, finish_reason: finishReason, logprobs: null, message: { role: 'assistant', content, refusal: null } }],
    };
}

describe('OpenAIService', () => {
    let embeddingsCreate: jest.Mock<Promise<CreateEmbeddingResponse>, [EmbeddingCreateParams, RequestOptions?]>;
    let completionsCreate: jest.Mock<Promise<ChatCompletion>, [ChatCompletionCreateParamsNonStreaming, RequestOptions?]>;
    let client: OpenAIClient;

    beforeEach(() => {
        embeddingsCreate = jest.fn<Promise<CreateEmbeddingResponse>, [EmbeddingCreateParams, RequestOptions?]>()
            .mockResolvedValue(embeddingResponse([0.1, 0.2, 0.3]));
        completionsCreate = jest.fn<Promise<ChatCompletion>, [ChatCompletionCreateParamsNonStreaming, RequestOptions?]>()
            .mockResolvedValue(completion('IAM is Identity and Access Management.', 'stop'));
        client = { embeddings: { create: embeddingsCreate }, chat: { completions: { create: completionsCreate } } };
    });

    it('requires an API key when no client is given', () => {
        expect(() => new OpenAIService({ ...config, openai: { ...config.openai, apiKey: '' } })).toThrow(
            'OPENAI_API_KEY environment variable is not set',
        );
    });

    it('requests embeddings of the configured size', async () => {
        const signal = new AbortController().signal;
        const service = new OpenAIService(config, client);

        await expect(service.embed('What is IAM?', signal)).resolves.toEqual([0.1, 0.2, 0.3]);
        expect(embeddingsCreate).toHaveBeenCalledWith(
            { model: 'text-embedding-3-small', input: 'What is IAM?', encoding_format: 'float', dimensions: 3 },
            { signal },
        );
    });

    it('leaves the size to older embedding models', async () => {
        const service = new OpenAIService(
            { ...config, openai: { ...config.openai, embeddingModel: 'text-embedding-ada-002' } },
            client,
        );

        await service.embed('What is IAM?');

        expect(embeddingsCreate).toHaveBeenCalledWith(
            { model: 'text-embedding-ada-002', input: 'What is IAM?', encoding_format: 'float' },
            { signal: undefined },
        );
    });

    it('rejects embeddings of the wrong size', async () => {
        embeddingsCreate.mockResolvedValue(embeddingResponse([0.1, 0.2]));
        const service = new OpenAIService(config, client);

        await expect(service.embed('What is IAM?')).rejects.toThrow('Embedding dimension mismatch: expected 3, got 2');
    });

    it('sends the system and user prompts', async () => {
        const signal = new AbortController().signal;
        const service = new OpenAIService(config, client);

        const answer = await service.complete(
            { system: 'You are a study assistant.', user: 'Question: What is IAM?' },
            { maxTokens: 256, temperature: 0.1, signal },
        );

        expect(answer).toBe('IAM is Identity and Access Management.');
        expect(completionsCreate).toHaveBeenCalledWith(
            {
                model: 'gpt-4o-mini',
                messages: [
                    { role: 'system', content: 'You are a study assistant.' },
                    { role: 'user', content: 'Question: What is IAM?' },
                ],
                temperature: 0.1,
                max_tokens: 256,
            },
            { signal },
        );
    });

    it('fails when the answer is filtered', async () => {
        completionsCreate.mockResolvedValue(completion(null, 'content_filter'));
        const service = new OpenAIService(config, client);

        await expect(
            service.complete({ system: 's', user: 'u' }, { maxTokens: 10, temperature: 0 }),
        ).rejects.toThrow('Answer was blocked by the content policy');
    });
});
