import type { Chunk, ContextualChunk } from "@docrag/types";

/** Attaches each chunk's neighbours' text, `""` at either end. */
export function linkContext(chunks: Chunk[]): ContextualChunk[] {
  return chunks.map((chunk, i) => ({
    ...chunk,
    contextBefore: chunks[i - 1]?.text ?? "",
    contextAfter: chunks[i + 1]?.text ?? "",
  }));
}
