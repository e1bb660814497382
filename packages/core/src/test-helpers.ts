import { DEFAULT_CHUNKING_CONFIG } from "@docrag/types";
import { RecursiveChunker } from "@docrag/chunker";
import { createExtractors } from "@docrag/extractor";
import { createLogger } from "@docrag/logger";
import { MemoryVectorStore } from "@docrag/vector-store";
import { KeywordEmbeddingProvider } from "@docrag/vector-store/testing";
import type { IVectorStore } from "@docrag/vector-store";
import type { IngestionDependencies } from "./ingestion-pipeline.js";

export const VOCABULARY = ["refund", "policy", "returns", "shipping", "days"];

export function memoryStore(): MemoryVectorStore {
  return new MemoryVectorStore({
    collectionName: "DocumentChunk",
    embedder: new KeywordEmbeddingProvider(VOCABULARY),
  });
}

export function ingestionDeps(vectorStore: IVectorStore): IngestionDependencies {
  return {
    extractors: createExtractors(),
    chunker: new RecursiveChunker(),
    chunking: DEFAULT_CHUNKING_CONFIG,
    vectorStore,
    logger: createLogger({ silent: true }),
  };
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}
