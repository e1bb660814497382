import type { VectorStoreConfig } from "@docrag/types";
import type { IEmbeddingProvider } from "@docrag/embeddings";
import { ValidationError } from "@docrag/errors";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { MemoryVectorStore } from "./memory-adapter.js";

export function createVectorStore(
  config: VectorStoreConfig,
  embedder: IEmbeddingProvider,
): IVectorStore {
  switch (config.type) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new ValidationError("qdrantUrl is required for Qdrant vector store", {
          qdrantUrl: "required",
        });
      }
      return new QdrantVectorStore({
        url: config.qdrantUrl,
        apiKey: config.qdrantApiKey,
        collectionName: config.collectionName,
        embedder,
      });
    case "memory":
      return new MemoryVectorStore({ collectionName: config.collectionName, embedder });
    default:
      throw new ValidationError(`Unknown vector store type: ${String(config.type)}`, {
        type: "unknown",
      });
  }
}
