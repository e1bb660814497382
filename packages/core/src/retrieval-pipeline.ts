import type { SearchRequest, SearchResult } from "@docrag/types";
import { withSession, type IVectorStore } from "@docrag/vector-store";
import { ValidationError } from "@docrag/errors";

export interface RetrievalDependencies {
  vectorStore: IVectorStore;
}

/**
 * Semantic search over stored chunks. Results keep the store's ordering
 * (descending relevance); an empty collection yields an empty list.
 */
export async function search(
  request: SearchRequest,
  deps: RetrievalDependencies,
): Promise<SearchResult[]> {
  if (!Number.isInteger(request.limit) || request.limit < 1) {
    throw new ValidationError("Limit must be a positive integer", { limit: "invalid" });
  }

  const hits = await withSession(deps.vectorStore, (session) =>
    session.nearText(request.query, request.limit),
  );

  return hits.map((hit) => ({
    text: hit.payload.text,
    documentName: hit.payload.document_name,
    chunkId: hit.payload.chunk_id,
    documentType: hit.payload.document_type,
    contextBefore: hit.payload.context_before ?? "",
    contextAfter: hit.payload.context_after ?? "",
    relevanceScore: hit.relevanceScore,
    distance: hit.distance,
  }));
}
