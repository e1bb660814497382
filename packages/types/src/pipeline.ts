import type { DocumentType } from "./document.js";

export type EmbeddingInputType = "search_document" | "search_query";

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface IngestionResult {
  documentName: string;
  documentType: DocumentType;
  chunkCount: number;
}

export interface BatchInsertFailure {
  chunkId: number;
  message: string;
}

export interface BatchInsertResult {
  inserted: number;
  failed: BatchInsertFailure[];
}
