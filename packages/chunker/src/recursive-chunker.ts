import type { Chunk, ChunkingConfig } from "@docrag/types";
import { ValidationError } from "@docrag/errors";
import type { IChunker } from "./chunker.interface.js";

/** Paragraph, line, word, then single characters. */
export const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

/** Length in Unicode code points, so astral characters count once. */
export function codePointLength(text: string): number {
  let length = 0;
  for (const _ of text) length++;
  return length;
}

/**
 * Recursive character splitting with a separator hierarchy.
 *
 * The coarsest separator present in the text is used first. Pieces that are
 * still too long are split again with the finer separators; the empty
 * separator cuts single characters, so every chunk fits `chunkSize`.
 * Neighbouring pieces are merged back into chunks, and each new chunk starts
 * with up to `chunkOverlap` characters of the previous one.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = separators ?? DEFAULT_SEPARATORS;
  }

  chunk(content: string, config: ChunkingConfig): Chunk[] {
    const texts = this.split(content, config);
    return texts.map((text, index) => ({ index, text, totalChunks: texts.length }));
  }

  split(content: string, config: ChunkingConfig): string[] {
    const { chunkSize, chunkOverlap } = config;

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ValidationError("Invalid chunking config", {
        chunkSize: "must be a positive integer",
      });
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap > chunkSize) {
      throw new ValidationError("Invalid chunking config", {
        chunkOverlap: "must be an integer between 0 and chunkSize",
      });
    }

    return this.splitRecursive(content, config.separators ?? this.separators, config);
  }

  private splitRecursive(text: string, separators: string[], config: ChunkingConfig): string[] {
    const { separator, finer } = this.pickSeparator(text, separators);
    const pieces = this.splitKeepingSeparator(text, separator);

    const results: string[] = [];
    let pending: string[] = [];

    for (const piece of pieces) {
      if (codePointLength(piece) < config.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        results.push(...this.mergePieces(pending, config));
        pending = [];
      }

      if (finer.length === 0) {
        results.push(piece);
      } else {
        results.push(...this.splitRecursive(piece, finer, config));
      }
    }

    if (pending.length > 0) {
      results.push(...this.mergePieces(pending, config));
    }

    return results;
  }

  private pickSeparator(
    text: string,
    separators: string[],
  ): { separator: string; finer: string[] } {
    for (let i = 0; i < separators.length; i++) {
      const separator = separators[i]!;
      if (separator === "" || text.includes(separator)) {
        return { separator, finer: separators.slice(i + 1) };
      }
    }
    return { separator: separators[separators.length - 1] ?? "", finer: [] };
  }

  /**
   * "a\n\nb" on "\n\n" gives ["a", "\n\nb"]: the separator stays at the start
   * of the piece that follows it, so joining pieces restores the text.
   */
  private splitKeepingSeparator(text: string, separator: string): string[] {
    if (separator === "") {
      return Array.from(text);
    }

    const parts = text.split(separator);
    const pieces = [parts[0]!];
    for (let i = 1; i < parts.length; i++) {
      pieces.push(separator + parts[i]!);
    }
    return pieces.filter((piece) => piece !== "");
  }

  private mergePieces(pieces: string[], config: ChunkingConfig): string[] {
    const { chunkSize, chunkOverlap } = config;
    const chunks: string[] = [];
    let window: string[] = [];
    let windowLength = 0;

    for (const piece of pieces) {
      const length = codePointLength(piece);

      if (windowLength + length > chunkSize) {
        if (window.length > 0) {
          this.pushJoined(chunks, window);

          // Slide: keep at most chunkOverlap characters, and only as much
          // as still leaves room for the incoming piece.
          while (
            windowLength > chunkOverlap ||
            (windowLength + length > chunkSize && windowLength > 0)
          ) {
            windowLength -= codePointLength(window[0]!);
            window = window.slice(1);
          }
        }
      }

      window.push(piece);
      windowLength += length;
    }

    this.pushJoined(chunks, window);
    return chunks;
  }

  private pushJoined(chunks: string[], window: string[]): void {
    const text = window.join("").trim();
    if (text !== "") {
      chunks.push(text);
    }
  }
}
