import type { ContextualChunk, DocumentRecord, DocumentType } from "@docrag/types";

export function buildRecord(
  documentName: string,
  documentType: DocumentType,
  chunk: ContextualChunk,
): DocumentRecord {
  return {
    documentName,
    documentType,
    chunkId: chunk.index,
    totalChunks: chunk.totalChunks,
    text: chunk.text,
    contextBefore: chunk.contextBefore,
    contextAfter: chunk.contextAfter,
  };
}

export function buildRecords(
  documentName: string,
  documentType: DocumentType,
  chunks: ContextualChunk[],
): DocumentRecord[] {
  return chunks.map((chunk) => buildRecord(documentName, documentType, chunk));
}
