/**
 * Milvus Vector Database Types
 */

/**
 * Row of the study material collection.
 */
export interface MilvusDocument {
    id: string;
    embedding: number[];
    text: string;
    source: string;
    ingestedAt: string;
}

export interface SearchResult {
    id: string;
    score: number;
    text: string;
    source: string;
}

export interface UpsertResult {
    upsertCount: number;
}
