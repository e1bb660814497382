export type {
  IVectorStore,
  VectorStoreSession,
  VectorSearchResult,
} from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export type { QdrantVectorStoreOptions, QdrantClientLike } from "./qdrant-adapter.js";
export { MemoryVectorStore } from "./memory-adapter.js";
export { createVectorStore } from "./factory.js";
export { withSession } from "./session.js";
export { toPayload, searchPayloadSchema } from "./payload.js";
export type { SearchPayload } from "./payload.js";
export { cosineSimilarity, scoreFromSimilarity } from "./similarity.js";
