import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import ragConfig from '../../../config/rag.config';
import { ChatPrompt, Passage } from '../types';

export const NO_CONTEXT_NOTICE = 'No relevant study material was found.';
const PASSAGE_SEPARATOR = '\n\n---\n\n';

/**
 * Prompt Builder Service - Prompt templates for answering from study material
 */
@Injectable()
export class PromptBuilderService {
    private readonly logger = new Logger(PromptBuilderService.name);

    constructor(@Inject(ragConfig.KEY) private readonly config: ConfigType<typeof ragConfig>) { }

    /**
     * Build system prompt for RAG response generation
     */
    buildSystemPrompt(): string {
        return `You are a study assistant helping a learner prepare for a certification exam.

Guidelines:
- Answer the question using the provided study material
- If the study material does not contain the answer, say so clearly
- Be concise and accurate, and avoid speculation`;
    }

    /**
     * Build user prompt for RAG query
     */
    buildUserPrompt(question: string, context: string): string {
        return `Context:
${context}

Question: ${question}

Answer:`;
    }

    /**
     * Select passage texts in retrieval order, stopping before the context limit.
     * The first passage is always kept.
     */
    buildContext(passages: Passage[]): string[] {
        let totalLength = 0;
        const contextChunks: string[] = [];

        for (const passage of passages) {
            const chunkLength = passage.text.length;

            if (totalLength + chunkLength > this.config.maxContextLength && contextChunks.length > 0) {
                this.logger.debug(`⚠️ Context length limit reached (${totalLength} chars)`);
                break;
            }

            contextChunks.push(passage.text);
            totalLength += chunkLength;
        }

        return contextChunks;
    }

    buildPrompt(question: string, passages: Passage[]): ChatPrompt {
        const contextChunks = this.buildContext(passages);
        const context = contextChunks.length > 0 ? contextChunks.join(PASSAGE_SEPARATOR) : NO_CONTEXT_NOTICE;

        this.logger.debug(`📝 Context built from ${contextChunks.length} passages (${context.length} chars)`);

        return {
            system: this.buildSystemPrompt(),
            user: this.buildUserPrompt(question, context),
        };
    }
}
