import type { AppConfig } from "@docrag/types";
import { RecursiveChunker } from "@docrag/chunker";
import { createEmbeddingProvider } from "@docrag/embeddings";
import { createExtractors } from "@docrag/extractor";
import { createVectorStore } from "@docrag/vector-store";
import type { Logger } from "@docrag/logger";
import type { Services } from "./services.js";

export function createServices(config: AppConfig, logger: Logger): Services {
  const embedder = createEmbeddingProvider(config.embeddings);

  return {
    config,
    logger,
    extractors: createExtractors(config.extraction),
    chunker: new RecursiveChunker(),
    vectorStore: createVectorStore(config.vectorStore, embedder),
  };
}
