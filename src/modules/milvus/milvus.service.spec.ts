import { ConfigType } from '@nestjs/config';
import milvusConfig from '../../config/milvus.config';
import { MilvusService } from './milvus.service';

const mockClient = {
    hasCollection: jest.fn(),
    createCollection: jest.fn(),
    createIndex: jest.fn(),
    getLoadingProgress: jest.fn(),
    loadCollectionSync: jest.fn(),
    upsert: jest.fn(),
    search: jest.fn(),
};

jest.mock('@zilliz/milvus2-sdk-node', () => ({
    MilvusClient: jest.fn(() => mockClient),
    DataType: { VarChar: 21, FloatVector: 101 },
    ErrorCode: { SUCCESS: 'Success' },
    MetricType: { COSINE: 'COSINE' },
}));

const config: ConfigType<typeof milvusConfig> = {
    address: 'localhost:19530',
    token: '',
    timeout: 1000,
    vectorDim: 3,
};

const ok = { error_code: 'Success', reason: '' };

const document = (id: string) => ({
    id,
    embedding: [0.1, 0.2, 0.3],
    text: 'IAM manages identities.',
    source: 'materials/iam.md',
    ingestedAt: '2024-01-01T00:00:00.000Z',
});

describe('MilvusService', () => {
    let service: MilvusService;

    beforeEach(() => {
        Object.values(mockClient).forEach((fn) => fn.mockReset());
        mockClient.hasCollection.mockResolvedValue({ status: ok, value: true });
        mockClient.createCollection.mockResolvedValue(ok);
        mockClient.createIndex.mockResolvedValue(ok);
        mockClient.getLoadingProgress.mockResolvedValue({ status: ok, progress: '100' });
        mockClient.loadCollectionSync.mockResolvedValue(ok);
        mockClient.upsert.mockResolvedValue({ status: ok, upsert_cnt: 1 });
        mockClient.search.mockResolvedValue({
            status: ok,
            results: [{ id: 'materials/iam.md-0', score: 0.92, text: 'IAM manages identities.', source: 'materials/iam.md' }],
        });
        service = new MilvusService(config);
    });

    it('searches an existing collection without changing it', async () => {
        await expect(service.search('cert_embeddings', [0.1, 0.2, 0.3], 2)).resolves.toEqual([
            { id: 'materials/iam.md-0', score: 0.92, text: 'IAM manages identities.', source: 'materials/iam.md' },
        ]);
        await service.search('cert_embeddings', [0.1, 0.2, 0.3], 2);

        expect(mockClient.hasCollection).toHaveBeenCalledTimes(1);
        expect(mockClient.search).toHaveBeenCalledWith({
            collection_name: 'cert_embeddings',
            data: [0.1, 0.2, 0.3],
            limit: 2,
            output_fields: ['id', 'text', 'source'],
            metric_type: 'COSINE',
            params: { nprobe: 16 },
        });
        expect(mockClient.getLoadingProgress).not.toHaveBeenCalled();
        expect(mockClient.loadCollectionSync).not.toHaveBeenCalled();
    });

    it('fails a search on a missing collection instead of creating it', async () => {
        mockClient.hasCollection.mockResolvedValue({ status: ok, value: false });

        await expect(service.search('cert_embeddings', [0.1, 0.2, 0.3])).rejects.toThrow(
            'Collection cert_embeddings does not exist',
        );
        expect(mockClient.createCollection).not.toHaveBeenCalled();
        expect(mockClient.search).not.toHaveBeenCalled();
    });

    it('creates and loads a missing collection once for concurrent upserts', async () => {
        mockClient.hasCollection.mockResolvedValue({ status: ok, value: false });
        mockClient.getLoadingProgress.mockResolvedValue({ status: ok, progress: '0' });

        const results = await Promise.all([
            service.upsertDocuments('cert_embeddings', [document('materials/iam.md-0')]),
            service.upsertDocuments('cert_embeddings', [document('materials/vpc.md-0')]),
        ]);

        expect(results).toEqual([{ upsertCount: 1 }, { upsertCount: 1 }]);
        expect(mockClient.hasCollection).toHaveBeenCalledTimes(1);
        expect(mockClient.createCollection).toHaveBeenCalledTimes(1);
        expect(mockClient.createIndex).toHaveBeenCalledTimes(1);
        expect(mockClient.loadCollectionSync).toHaveBeenCalledTimes(1);
        expect(mockClient.upsert).toHaveBeenCalledTimes(2);
    });

    it('retries collection setup after a failure', async () => {
        mockClient.hasCollection.mockResolvedValue({ status: ok, value: false });
        mockClient.createCollection.mockResolvedValueOnce({ error_code: 'UnexpectedError', reason: 'disk full' });

        await expect(
            service.upsertDocuments('cert_embeddings', [document('materials/iam.md-0')]),
        ).rejects.toThrow('Create collection cert_embeddings failed: disk full');
        await expect(
            service.upsertDocuments('cert_embeddings', [document('materials/iam.md-0')]),
        ).resolves.toEqual({ upsertCount: 1 });

        expect(mockClient.createCollection).toHaveBeenCalledTimes(2);
    });
});
