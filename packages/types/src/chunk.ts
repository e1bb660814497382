export interface Chunk {
  index: number;
  text: string;
  totalChunks: number;
}

export interface ContextualChunk extends Chunk {
  contextBefore: string;
  contextAfter: string;
}

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 500,
  chunkOverlap: 150,
};
