/**
 * Core RAG Type Definitions (Framework-Free)
 */

/**
 * Passage of indexed study material returned by retrieval, most relevant first.
 */
export interface Passage {
    text: string;
    score: number;
    source: string;
}

export interface AskRequest {
    query: string;
    includeSources?: boolean;
}

export interface Answer {
    answer: string;
    sources?: Passage[];
}

export interface ChatPrompt {
    system: string;
    user: string;
}

export interface CompletionOptions {
    maxTokens: number;
    temperature: number;
    signal?: AbortSignal;
}

/**
 * Embedding half of a model provider.
 */
export interface EmbeddingProvider {
    readonly embeddingModel: string;
    embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

/**
 * Generation half of a model provider.
 */
export interface ChatProvider {
    readonly chatModel: string;
    complete(prompt: ChatPrompt, options: CompletionOptions): Promise<string>;
}

export type ModelProvider = EmbeddingProvider & ChatProvider;

/**
 * Chunk representation
 */
export interface Chunk {
    index: number;
    text: string;
    wordCount: number;
}

/**
 * Chunking options
 */
export interface ChunkingOptions {
    chunkSize: number;
    overlap: number;
}

/**
 * A study material object to ingest.
 */
export interface StudyMaterial {
    key: string;
    body: Buffer;
    contentType?: string;
}

export interface IngestionResult {
    key: string;
    chunkCount: number;
    storedCount: number;
}
