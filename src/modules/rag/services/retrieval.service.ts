import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import ragConfig from '../../../config/rag.config';
import { RetrievalError, errorMessage } from '../../../common/errors/ask.errors';
import { TimeoutError, withTimeout } from '../../../common/utils/timeout.util';
import { MilvusService } from '../../milvus/milvus.service';
import { MODEL_PROVIDER } from '../rag.constants';
import { EmbeddingProvider, Passage } from '../types';

/**
 * Retrieval Service - embeds the question and searches the passage index.
 * Every failure leaves this service as a RetrievalError.
 */
@Injectable()
export class RetrievalService {
    private readonly logger = new Logger(RetrievalService.name);

    constructor(
        @Inject(ragConfig.KEY) private readonly config: ConfigType<typeof ragConfig>,
        @Inject(MODEL_PROVIDER) private readonly embeddings: EmbeddingProvider,
        private readonly milvusService: MilvusService,
    ) { }

    async retrieve(query: string, topK: number = this.config.topK): Promise<Passage[]> {
        try {
            return await withTimeout(
                (signal) => this.search(query, topK, signal),
                this.config.retrievalTimeoutMs,
                'Retrieval',
            );
        } catch (error) {
            if (error instanceof TimeoutError) {
                this.logger.error(`⏱️ ${error.message}`);
                throw new RetrievalError(`retrieval timed out after ${error.timeoutMs}ms`, {
                    cause: error,
                    timedOut: true,
                });
            }
            this.logger.error(`❌ Retrieval failed: ${errorMessage(error)}`);
            throw new RetrievalError(`retrieval failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    private async search(query: string, topK: number, signal: AbortSignal): Promise<Passage[]> {
        const embedding = await this.embeddings.embed(query, signal);
        this.logger.debug(`✅ Generated question embedding with ${this.embeddings.embeddingModel}`);

        const results = await this.milvusService.search(this.config.collection, embedding, topK);
        return results.map((result) => ({
            text: result.text,
            score: result.score,
            source: result.source,
        }));
    }
}
