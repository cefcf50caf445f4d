import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import aiConfig from '../../../config/ai.config';
import ragConfig from '../../../config/rag.config';
import { GenerationError, errorMessage } from '../../../common/errors/ask.errors';
import { TimeoutError, withTimeout } from '../../../common/utils/timeout.util';
import { MODEL_PROVIDER } from '../rag.constants';
import { ChatProvider, Passage } from '../types';
import { PromptBuilderService } from './prompt-builder.service';

/**
 * Generation Service - asks the chat model for an answer grounded in the passages.
 * Every failure leaves this service as a GenerationError.
 */
@Injectable()
export class GenerationService {
    private readonly logger = new Logger(GenerationService.name);

    constructor(
        @Inject(ragConfig.KEY) private readonly config: ConfigType<typeof ragConfig>,
        @Inject(aiConfig.KEY) private readonly ai: ConfigType<typeof aiConfig>,
        @Inject(MODEL_PROVIDER) private readonly chat: ChatProvider,
        private readonly promptBuilder: PromptBuilderService,
    ) { }

    async generate(question: string, passages: Passage[]): Promise<string> {
        const prompt = this.promptBuilder.buildPrompt(question, passages);

        let answer: string;
        try {
            answer = await withTimeout(
                (signal) => this.chat.complete(prompt, {
                    maxTokens: this.ai.maxAnswerTokens,
                    temperature: this.ai.temperature,
                    signal,
                }),
                this.config.generationTimeoutMs,
                'Generation',
            );
        } catch (error) {
            if (error instanceof TimeoutError) {
                this.logger.error(`⏱️ ${error.message}`);
                throw new GenerationError(`generation timed out after ${error.timeoutMs}ms`, {
                    cause: error,
                    timedOut: true,
                });
            }
            this.logger.error(`❌ Generation failed: ${errorMessage(error)}`);
            throw new GenerationError(`generation failed: ${errorMessage(error)}`, { cause: error });
        }

        const trimmed = answer.trim();
        if (!trimmed) {
            throw new GenerationError(`generation returned an empty answer (${this.chat.chatModel})`);
        }
        return trimmed;
    }
}
