import type { BatchInsertResult, DocumentRecord } from "@docrag/types";
import type { SearchPayload } from "./payload.js";

export interface VectorSearchResult {
  id: string;
  /** `(1 + cosine) / 2`, in 0..1. */
  relevanceScore: number;
  /** `1 - cosine`. */
  distance: number;
  payload: SearchPayload;
}

/**
 * One connection to the store. Sessions are short-lived: open one per
 * operation and close it on every path (see `withSession`).
 */
export interface VectorStoreSession {
  ensureCollection(): Promise<void>;
  deleteCollection(): Promise<void>;
  insertBatch(records: DocumentRecord[]): Promise<BatchInsertResult>;
  deleteByDocumentName(documentName: string): Promise<void>;
  /** Results ordered by descending relevance. */
  nearText(text: string, limit: number): Promise<VectorSearchResult[]>;
  close(): Promise<void>;
}

export interface IVectorStore {
  readonly collectionName: string;
  connect(): Promise<VectorStoreSession>;
  healthCheck(): Promise<boolean>;
}
