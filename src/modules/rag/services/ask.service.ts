import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import ragConfig from '../../../config/rag.config';
import { ValidationError } from '../../../common/errors/ask.errors';
import { Answer, AskRequest } from '../types';
import { GenerationService } from './generation.service';
import { RetrievalService } from './retrieval.service';

/**
 * Query handler: validate → retrieve → generate → respond.
 *
 * Stateless. Errors are the AskError subclasses raised by each step and are
 * turned into HTTP responses by the global exception filter.
 */
@Injectable()
export class AskService {
    private readonly logger = new Logger(AskService.name);

    constructor(
        @Inject(ragConfig.KEY) private readonly config: ConfigType<typeof ragConfig>,
        private readonly retrievalService: RetrievalService,
        private readonly generationService: GenerationService,
    ) { }

    async ask(request: AskRequest): Promise<Answer> {
        const query = typeof request.query === 'string' ? request.query.trim() : '';
        if (!query) {
            throw new ValidationError('query must be non-empty');
        }
        if (query.length > this.config.maxQueryLength) {
            throw new ValidationError(`query must be at most ${this.config.maxQueryLength} characters`);
        }

        const startTime = Date.now();
        this.logger.log(`❓ QUESTION: "${query.substring(0, 100)}"`);

        const passages = await this.retrievalService.retrieve(query, this.config.topK);
        const retrievalTime = Date.now() - startTime;
        this.logger.log(`📄 Retrieved ${passages.length} passages in ${retrievalTime}ms`);

        const answer = await this.generationService.generate(query, passages);
        const totalTime = Date.now() - startTime;

        this.logger.log(`💬 Answer: "${answer.substring(0, 100)}${answer.length > 100 ? '...' : ''}"`);
        this.logger.log(`⏱️  Total Time: ${totalTime}ms (generation ${totalTime - retrievalTime}ms)`);

        return request.includeSources ? { answer, sources: passages } : { answer };
    }
}
