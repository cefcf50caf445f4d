import { Test } from '@nestjs/testing';
import { ConfigType } from '@nestjs/config';
import ragConfig from '../../../config/rag.config';
import { RetrievalError } from '../../../common/errors/ask.errors';
import { MilvusService } from '../../milvus/milvus.service';
import { SearchResult } from '../../milvus/types/milvus.types';
import { MODEL_PROVIDER } from '../rag.constants';
import { EmbeddingProvider } from '../types';
import { RetrievalService } from './retrieval.service';

jest.mock('@zilliz/milvus2-sdk-node', () => ({}));

const baseConfig: ConfigType<typeof ragConfig> = {
    collection: 'cert_embeddings',
    topK: 5,
    maxContextLength: 8000,
    maxQueryLength: 2000,
    retrievalTimeoutMs: 1000,
    generationTimeoutMs: 1000,
    chunkSize: 500,
    chunkOverlap: 0,
};

describe('RetrievalService', () => {
    let embed: jest.Mock<Promise<number[]>, [string, AbortSignal?]>;
    let search: jest.Mock<Promise<SearchResult[]>, [string, number[], number?]>;

    async function createService(overrides: Partial<ConfigType<typeof ragConfig>> = {}): Promise<RetrievalService> {
        const embeddings: EmbeddingProvider = { embeddingModel: 'fake-embed', embed };
        const moduleRef = await Test.createTestingModule({
            providers: [
                RetrievalService,
                { provide: ragConfig.KEY, useValue: { ...baseConfig, ...overrides } },
                { provide: MODEL_PROVIDER, useValue: embeddings },
                { provide: MilvusService, useValue: { search } },
            ],
        }).compile();
        return moduleRef.get(RetrievalService);
    }

    beforeEach(() => {
        embed = jest.fn<Promise<number[]>, [string, AbortSignal?]>().mockResolvedValue([0.1, 0.2, 0.3]);
        search = jest.fn<Promise<SearchResult[]>, [string, number[], number?]>().mockResolvedValue([
            { id: 'materials/iam.md-0', score: 0.92, text: 'IAM manages identities.', source: 'materials/iam.md' },
            { id: 'materials/iam.md-1', score: 0.81, text: 'Policies grant permissions.', source: 'materials/iam.md' },
        ]);
    });

    it('embeds the query and returns the nearest passages in order', async () => {
        const service = await createService();

        await expect(service.retrieve('What is IAM?', 2)).resolves.toEqual([
            { text: 'IAM manages identities.', score: 0.92, source: 'materials/iam.md' },
            { text: 'Policies grant permissions.', score: 0.81, source: 'materials/iam.md' },
        ]);
        expect(embed).toHaveBeenCalledWith('What is IAM?', expect.any(AbortSignal));
        expect(search).toHaveBeenCalledWith('cert_embeddings', [0.1, 0.2, 0.3], 2);
    });

    it('uses the configured top K by default', async () => {
        const service = await createService({ topK: 7 });

        await service.retrieve('What is IAM?');

        expect(search).toHaveBeenCalledWith('cert_embeddings', [0.1, 0.2, 0.3], 7);
    });

    it('wraps backend failures in a 502 RetrievalError', async () => {
        search.mockRejectedValue(new Error('Search cert_embeddings failed: collection not loaded'));
        const service = await createService();

        const error = await service.retrieve('What is IAM?').catch((err: unknown) => err);

        expect(error).toBeInstanceOf(RetrievalError);
        expect(error).toMatchObject({
            status: 502,
            timedOut: false,
            message: 'retrieval failed: Search cert_embeddings failed: collection not loaded',
        });
    });

    it('reports a 504 RetrievalError when the deadline passes', async () => {
        embed.mockReturnValue(new Promise<number[]>(() => undefined));
        const service = await createService({ retrievalTimeoutMs: 20 });

        const error = await service.retrieve('What is IAM?').catch((err: unknown) => err);

        expect(error).toBeInstanceOf(RetrievalError);
        expect(error).toMatchObject({ status: 504, timedOut: true, message: 'retrieval timed out after 20ms' });
        expect(search).not.toHaveBeenCalled();
    });
});
