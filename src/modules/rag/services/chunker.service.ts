import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import ragConfig from '../../../config/rag.config';
import { Chunk, ChunkingOptions } from '../types';

/**
 * Text Chunker Service - splits extracted study material into word windows
 */
@Injectable()
export class ChunkerService {
    private readonly logger = new Logger(ChunkerService.name);

    constructor(@Inject(ragConfig.KEY) private readonly config: ConfigType<typeof ragConfig>) { }

    /**
     * Chunk text into windows of `chunkSize` whitespace-separated words,
     * consecutive windows sharing `overlap` words.
     */
    chunkText(
        text: string,
        options: ChunkingOptions = { chunkSize: this.config.chunkSize, overlap: this.config.chunkOverlap },
    ): Chunk[] {
        const { chunkSize, overlap } = options;
        if (chunkSize < 1 || overlap < 0 || overlap >= chunkSize) {
            throw new Error(`Invalid chunking options: size=${chunkSize}, overlap=${overlap}`);
        }

        const words = text.split(/\s+/).filter((word) => word.length > 0);
        const chunks: Chunk[] = [];
        const step = chunkSize - overlap;

        for (let start = 0; start < words.length; start += step) {
            const window = words.slice(start, start + chunkSize);
            chunks.push({
                index: chunks.length,
                text: window.join(' '),
                wordCount: window.length,
            });

            if (start + chunkSize >= words.length) {
                break;
            }
        }

        this.logger.debug(`📄 Created ${chunks.length} chunks from ${words.length} words`);
        return chunks;
    }
}
