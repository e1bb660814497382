export interface UploadResponse {
  success: true;
  message: string;
  chunks: number;
}

export interface WireSearchResult {
  text: string;
  document_name: string;
  chunk_id: number;
  document_type: string;
  context_before: string;
  context_after: string;
  relevance_score: number;
  distance: number;
}

export interface QueryResponse {
  results: WireSearchResult[];
  query: string;
}

export interface DeleteResponse {
  message: string;
}

export interface HealthResponse {
  status: "ok" | "unavailable";
}

export interface ApiErrorResponse {
  success: false;
  detail: string;
  code: string;
  requestId: string;
  chunks?: number;
}
