import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import ragConfig from '../../../config/rag.config';
import { chunkId } from '../../../common/utils/hash.util';
import { MilvusService } from '../../milvus/milvus.service';
import { MilvusDocument } from '../../milvus/types/milvus.types';
import { MODEL_PROVIDER } from '../rag.constants';
import { EmbeddingProvider, IngestionResult, StudyMaterial } from '../types';
import { ChunkerService } from './chunker.service';
import { TextExtractorService } from './text-extractor.service';

/**
 * Ingestion Service - extract, chunk, embed, and store study material
 */
@Injectable()
export class IngestionService {
    private readonly logger = new Logger(IngestionService.name);

    constructor(
        @Inject(ragConfig.KEY) private readonly config: ConfigType<typeof ragConfig>,
        @Inject(MODEL_PROVIDER) private readonly embeddings: EmbeddingProvider,
        private readonly milvusService: MilvusService,
        private readonly chunkerService: ChunkerService,
        private readonly textExtractor: TextExtractorService,
    ) { }

    async ingest(material: StudyMaterial): Promise<IngestionResult> {
        const startTime = Date.now();
        this.logger.log(`📄 Processing study material: ${material.key}`);

        const text = await this.textExtractor.extract(material.key, material.body);
        const chunks = this.chunkerService.chunkText(text);

        if (chunks.length === 0) {
            this.logger.warn(`⚠️ No text found in ${material.key}, nothing stored`);
            return { key: material.key, chunkCount: 0, storedCount: 0 };
        }

        const ingestedAt = new Date().toISOString();
        const documents: MilvusDocument[] = [];
        for (const chunk of chunks) {
            documents.push({
                id: chunkId(material.key, chunk.index),
                embedding: await this.embeddings.embed(chunk.text),
                text: chunk.text,
                source: material.key,
                ingestedAt,
            });
        }

        const result = await this.milvusService.upsertDocuments(this.config.collection, documents);

        this.logger.log(`✅ ${material.key}: stored ${result.upsertCount} of ${chunks.length} chunks in ${Date.now() - startTime}ms`);
        return { key: material.key, chunkCount: chunks.length, storedCount: result.upsertCount };
    }
}
