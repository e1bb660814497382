import type {
  BatchInsertResult,
  ChunkingConfig,
  IngestionResult,
  RawDocument,
} from "@docrag/types";
import type { IChunker } from "@docrag/chunker";
import { extractText, type ExtractorRegistry } from "@docrag/extractor";
import { withSession, type IVectorStore } from "@docrag/vector-store";
import { PartialBatchFailureError } from "@docrag/errors";
import { createChildLogger, type Logger } from "@docrag/logger";
import { linkContext } from "./context-linker.js";
import { buildRecords } from "./record-builder.js";

export interface IngestionDependencies {
  extractors: ExtractorRegistry;
  chunker: IChunker;
  chunking: ChunkingConfig;
  vectorStore: IVectorStore;
  logger: Logger;
}

/**
 * Ingestion pipeline: Extract -> Chunk -> Link -> Replace
 *
 * Extraction and chunking finish before the store is touched, so a document
 * that cannot be read leaves its previously stored chunks in place. The
 * delete of the old chunks and the insert of the new ones are not atomic.
 */
export async function ingest(
  document: RawDocument,
  deps: IngestionDependencies,
): Promise<IngestionResult> {
  const log = createChildLogger(deps.logger, {
    documentName: document.name,
    documentType: document.declaredType,
  });

  // Phase 1: Extract
  const text = await extractText(deps.extractors, document.bytes, document.declaredType);
  log.debug({ characters: text.length }, "Text extracted");

  // Phase 2: Chunk
  const chunks = linkContext(deps.chunker.chunk(text, deps.chunking));
  const records = buildRecords(document.name, document.declaredType, chunks);
  log.debug({ chunkCount: records.length }, "Document chunked");

  // Phase 3: Replace stored chunks
  const result = await withSession(
    deps.vectorStore,
    async (session): Promise<BatchInsertResult> => {
      await session.deleteByDocumentName(document.name);
      if (records.length === 0) return { inserted: 0, failed: [] };
      return session.insertBatch(records);
    },
  );

  if (result.inserted < records.length) {
    log.warn(
      { inserted: result.inserted, total: records.length, failed: result.failed },
      "Some chunks were not stored",
    );
    throw new PartialBatchFailureError(result.inserted, records.length);
  }

  log.info({ chunkCount: records.length }, "Document ingested");

  return {
    documentName: document.name,
    documentType: document.declaredType,
    chunkCount: records.length,
  };
}
