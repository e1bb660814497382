import type { AppConfig } from "@docrag/types";
import type { IChunker } from "@docrag/chunker";
import type { ExtractorRegistry } from "@docrag/extractor";
import type { IVectorStore } from "@docrag/vector-store";
import type { Logger } from "@docrag/logger";

/** Everything the HTTP layer needs, built once at startup. */
export interface Services {
  config: AppConfig;
  logger: Logger;
  extractors: ExtractorRegistry;
  chunker: IChunker;
  vectorStore: IVectorStore;
}
