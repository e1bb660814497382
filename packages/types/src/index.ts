export type {
  RawDocument,
  DocumentRecord,
  DocumentType,
  StoredRecordPayload,
} from "./document.js";
export { DOCUMENT_TYPES, isDocumentType } from "./document.js";

export type { Chunk, ContextualChunk, ChunkingConfig } from "./chunk.js";
export { DEFAULT_CHUNKING_CONFIG } from "./chunk.js";

export type {
  EmbeddingInputType,
  EmbeddingResult,
  IngestionResult,
  BatchInsertFailure,
  BatchInsertResult,
} from "./pipeline.js";

export type { SearchRequest, SearchResult } from "./query.js";

export type {
  UploadResponse,
  WireSearchResult,
  QueryResponse,
  DeleteResponse,
  HealthResponse,
  ApiErrorResponse,
} from "./api.js";

export type {
  AppConfig,
  VectorStoreType,
  EmbeddingProviderType,
  VectorStoreConfig,
  EmbeddingsConfig,
  ExtractionConfig,
  UploadConfig,
  CorsConfig,
} from "./config.js";
