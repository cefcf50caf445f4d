import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import aiConfig from '../../config/ai.config';
import ragConfig from '../../config/rag.config';
import { MilvusModule } from '../milvus/milvus.module';
import { modelProvider } from './model-provider';
import { AskService } from './services/ask.service';
import { ChunkerService } from './services/chunker.service';
import { GenerationService } from './services/generation.service';
import { IngestionService } from './services/ingestion.service';
import { PromptBuilderService } from './services/prompt-builder.service';
import { RetrievalService } from './services/retrieval.service';
import { TextExtractorService } from './services/text-extractor.service';

/**
 * RAG Module - question answering and study material ingestion
 */
@Module({
    imports: [MilvusModule, ConfigModule.forFeature(aiConfig), ConfigModule.forFeature(ragConfig)],
    providers: [
        modelProvider,
        AskService,
        RetrievalService,
        GenerationService,
        PromptBuilderService,
        ChunkerService,
        TextExtractorService,
        IngestionService,
    ],
    exports: [AskService, IngestionService, TextExtractorService],
})
export class RagModule { }
