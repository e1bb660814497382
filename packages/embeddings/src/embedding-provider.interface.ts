import type { EmbeddingInputType, EmbeddingResult } from "@docrag/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /** Stored chunks are embedded as "search_document", queries as "search_query". */
  embed(text: string, inputType: EmbeddingInputType): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], inputType: EmbeddingInputType): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
