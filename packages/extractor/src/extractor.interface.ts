import type { DocumentType } from "@docrag/types";

export interface IExtractor<T extends DocumentType = DocumentType> {
  readonly type: T;
  extract(input: Uint8Array): Promise<string>;
}

/** Exactly one extractor per document type. */
export type ExtractorRegistry = { [T in DocumentType]: IExtractor<T> };
