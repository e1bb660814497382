import { z } from "zod";
import type { DocumentRecord, StoredRecordPayload } from "@docrag/types";

export function toPayload(record: DocumentRecord): StoredRecordPayload {
  return {
    document_name: record.documentName,
    chunk_id: record.chunkId,
    document_type: record.documentType,
    total_chunks: record.totalChunks,
    text: record.text,
    context_before: record.contextBefore,
    context_after: record.contextAfter,
  };
}

// Context fields may be absent on records written by older ingests.
export const searchPayloadSchema = z.object({
  document_name: z.string(),
  chunk_id: z.number().int(),
  document_type: z.string(),
  total_chunks: z.number().int(),
  text: z.string(),
  context_before: z.string().optional(),
  context_after: z.string().optional(),
});

export type SearchPayload = z.infer<typeof searchPayloadSchema>;
