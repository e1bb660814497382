import type { ChunkingConfig } from "./chunk.js";

export type VectorStoreType = "qdrant" | "memory";

export type EmbeddingProviderType = "cohere" | "bge-m3";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  vectorStore: VectorStoreConfig;
  embeddings: EmbeddingsConfig;
  extraction: ExtractionConfig;
  chunking: ChunkingConfig;
  upload: UploadConfig;
  cors: CorsConfig;
}

export interface VectorStoreConfig {
  type: VectorStoreType;
  collectionName: string;
  qdrantUrl?: string;
  qdrantApiKey?: string;
}

export interface EmbeddingsConfig {
  provider: EmbeddingProviderType;
  dimensions: number;
  cohereApiKey?: string;
  cohereModel: string;
  bgeM3Url?: string;
}

export interface ExtractionConfig {
  tesseractCmd: string;
  pdftoppmCmd: string;
  ocrDpi: number;
  textEncoding: string;
}

export interface UploadConfig {
  maxBytes: number;
}

export interface CorsConfig {
  /** `"*"` allows every origin. */
  origins: string[] | "*";
}
