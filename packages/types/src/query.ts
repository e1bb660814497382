export interface SearchRequest {
  query: string;
  limit: number;
}

export interface SearchResult {
  text: string;
  documentName: string;
  chunkId: number;
  documentType: string;
  contextBefore: string;
  contextAfter: string;
  /** Similarity in 0..1, higher is more relevant. */
  relevanceScore: number;
  distance: number;
}
