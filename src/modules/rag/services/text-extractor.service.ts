import { Injectable, Logger } from '@nestjs/common';
import * as mammoth from 'mammoth';
import pdfParse from 'pdf-parse';
import * as path from 'path';

export class UnsupportedMaterialError extends Error {
    constructor(readonly key: string) {
        super(`Unsupported file type: ${key}`);
        this.name = 'UnsupportedMaterialError';
    }
}

type Extractor = (body: Buffer) => Promise<string>;

/**
 * Text Extractor Service - plain text out of uploaded study material
 */
@Injectable()
export class TextExtractorService {
    private readonly logger = new Logger(TextExtractorService.name);

    private readonly extractors: Record<string, Extractor | undefined> = {
        '.pdf': async (body) => (await pdfParse(body)).text,
        '.docx': async (body) => (await mammoth.extractRawText({ buffer: body })).value,
        '.txt': async (body) => body.toString('utf-8'),
        '.md': async (body) => body.toString('utf-8'),
    };

    isSupported(key: string): boolean {
        return path.extname(key).toLowerCase() in this.extractors;
    }

    supportedExtensions(): string[] {
        return Object.keys(this.extractors);
    }

    async extract(key: string, body: Buffer): Promise<string> {
        const extension = path.extname(key).toLowerCase();
        const extractor = this.extractors[extension];
        if (!extractor) {
            throw new UnsupportedMaterialError(key);
        }

        const text = await extractor(body);
        this.logger.debug(`📄 Extracted ${text.length} chars from ${key}`);
        return text;
    }
}
