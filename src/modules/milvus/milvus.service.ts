import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { DataType, ErrorCode, MetricType, MilvusClient } from '@zilliz/milvus2-sdk-node';
import milvusConfig from '../../config/milvus.config';
import { MilvusDocument, SearchResult, UpsertResult } from './types/milvus.types';

const OUTPUT_FIELDS = ['id', 'text', 'source'];

interface MilvusStatus {
    error_code: string | number;
    reason: string;
}

@Injectable()
export class MilvusService implements OnModuleInit, OnModuleDestroy {
    private readonly logger = new Logger(MilvusService.name);
    private readonly client: MilvusClient;
    private readonly DEFAULT_METRIC_TYPE = MetricType.COSINE;
    private readonly DEFAULT_INDEX_TYPE = 'IVF_FLAT';
    private readonly existingCollections = new Set<string>();
    // Collection setup in progress or done, one per collection name.
    private readonly collectionsReady = new Map<string, Promise<void>>();

    constructor(@Inject(milvusConfig.KEY) private readonly config: ConfigType<typeof milvusConfig>) {
        this.client = new MilvusClient({
            address: config.address,
            token: config.token,
            timeout: config.timeout,
        });
    }

    async onModuleInit() {
        this.logger.log(`🔗 Connecting to Milvus at ${this.config.address.substring(0, 50)}...`);
        const health = await this.client.checkHealth();
        if (!health.isHealthy) {
            throw new Error(`Milvus is not healthy: ${health.reasons.join(', ')}`);
        }
        this.logger.log('✅ Milvus connection successful');
    }

    async onModuleDestroy() {
        await this.client.closeConnection();
        this.logger.log('✅ Milvus connection closed');
    }

    /**
     * Ensure collection exists and is loaded, create it if not.
     * Concurrent callers share one setup.
     */
    async ensureCollection(collectionName: string): Promise<void> {
        let ready = this.collectionsReady.get(collectionName);
        if (!ready) {
            ready = this.prepareCollection(collectionName);
            this.collectionsReady.set(collectionName, ready);
        }

        try {
            await ready;
        } catch (error) {
            if (this.collectionsReady.get(collectionName) === ready) {
                this.collectionsReady.delete(collectionName);
            }
            throw error;
        }
    }

    private async prepareCollection(collectionName: string): Promise<void> {
        if (!(await this.collectionExists(collectionName))) {
            this.logger.log(`📦 Creating collection: ${collectionName}`);
            await this.createCollection(collectionName);
            this.existingCollections.add(collectionName);
        }

        const progress = await this.client.getLoadingProgress({ collection_name: collectionName });
        if (Number(progress.progress) !== 100) {
            this.logger.log(`📥 Loading collection: ${collectionName}`);
            const loaded = await this.client.loadCollectionSync({ collection_name: collectionName });
            this.assertSuccess(loaded, `Load collection ${collectionName}`);
        }
    }

    private async collectionExists(collectionName: string): Promise<boolean> {
        if (this.existingCollections.has(collectionName)) {
            return true;
        }

        const exists = await this.client.hasCollection({ collection_name: collectionName });
        this.assertSuccess(exists.status, `Check collection ${collectionName}`);
        if (exists.value) {
            this.existingCollections.add(collectionName);
        }
        return Boolean(exists.value);
    }

    /**
     * Create the study material collection with an index on the embedding field
     */
    private async createCollection(collectionName: string): Promise<void> {
        const created = await this.client.createCollection({
            collection_name: collectionName,
            description: `Study material passages: ${collectionName}`,
            fields: [
                { name: 'id', data_type: DataType.VarChar, is_primary_key: true, max_length: 512 },
                { name: 'embedding', data_type: DataType.FloatVector, dim: this.config.vectorDim },
                { name: 'text', data_type: DataType.VarChar, max_length: 65535 },
                { name: 'source', data_type: DataType.VarChar, max_length: 1024 },
                { name: 'ingested_at', data_type: DataType.VarChar, max_length: 64 },
            ],
        });
        this.assertSuccess(created, `Create collection ${collectionName}`);

        const indexed = await this.client.createIndex({
            collection_name: collectionName,
            field_name: 'embedding',
            index_type: this.DEFAULT_INDEX_TYPE,
            metric_type: this.DEFAULT_METRIC_TYPE,
            params: { nlist: 128 },
        });
        this.assertSuccess(indexed, `Create index on ${collectionName}.embedding`);

        this.logger.log(`✅ Collection ${collectionName} created with index (${this.DEFAULT_INDEX_TYPE})`);
    }

    /**
     * Insert or replace documents by id
     */
    async upsertDocuments(collectionName: string, documents: MilvusDocument[]): Promise<UpsertResult> {
        await this.ensureCollection(collectionName);

        const response = await this.client.upsert({
            collection_name: collectionName,
            data: documents.map((doc) => ({
                id: doc.id,
                embedding: doc.embedding,
                text: doc.text,
                source: doc.source,
                ingested_at: doc.ingestedAt,
            })),
        });
        this.assertSuccess(response.status, `Upsert into ${collectionName}`);

        this.logger.log(`✅ Upserted ${documents.length} documents in ${collectionName}`);
        return { upsertCount: Number(response.upsert_cnt) };
    }

    /**
     * Search for similar vectors in an existing collection
     */
    async search(collectionName: string, embedding: number[], topK: number = 5): Promise<SearchResult[]> {
        // Read-only: collections are created and loaded by ingestion.
        if (!(await this.collectionExists(collectionName))) {
            throw new Error(`Collection ${collectionName} does not exist`);
        }

        const response = await this.client.search({
            collection_name: collectionName,
            data: embedding,
            limit: topK,
            output_fields: OUTPUT_FIELDS,
            metric_type: this.DEFAULT_METRIC_TYPE,
            params: { nprobe: 16 },
        });
        this.assertSuccess(response.status, `Search ${collectionName}`);

        // One query vector, so one list of hits.
        const results: SearchResult[] = response.results.flat().map((hit) => ({
            id: String(hit.id),
            score: Number(hit.score),
            text: typeof hit.text === 'string' ? hit.text : '',
            source: typeof hit.source === 'string' ? hit.source : '',
        }));

        this.logger.log(`🔍 Search completed: found ${results.length} results in ${collectionName}`);
        return results;
    }

    /**
     * Get client for advanced operations
     */
    getClient(): MilvusClient {
        return this.client;
    }

    private assertSuccess(status: MilvusStatus, operation: string): void {
        if (status.error_code !== ErrorCode.SUCCESS) {
            throw new Error(`${operation} failed: ${status.reason || status.error_code}`);
        }
    }
}
