import type { Chunk, ChunkingConfig } from "@docrag/types";

export interface IChunker {
  readonly strategy: string;
  /** Ordered chunk texts; empty input yields no chunks. */
  split(content: string, config: ChunkingConfig): string[];
  /** The same split, indexed and counted. */
  chunk(content: string, config: ChunkingConfig): Chunk[];
}
