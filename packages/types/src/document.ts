export const DOCUMENT_TYPES = ["pdf", "docx", "txt", "json"] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}

/**
 * An uploaded file before text extraction. `name` identifies the document:
 * re-uploading under the same name replaces every chunk stored for it.
 */
export interface RawDocument {
  name: string;
  declaredType: DocumentType;
  bytes: Uint8Array;
}

export interface DocumentRecord {
  documentName: string;
  documentType: DocumentType;
  chunkId: number;
  totalChunks: number;
  text: string;
  contextBefore: string;
  contextAfter: string;
}

/** A record as persisted in the vector store collection. */
export type StoredRecordPayload = {
  document_name: string;
  chunk_id: number;
  document_type: string;
  total_chunks: number;
  text: string;
  context_before: string;
  context_after: string;
};
