export type { IChunker } from "./chunker.interface.js";
export { RecursiveChunker, DEFAULT_SEPARATORS, codePointLength } from "./recursive-chunker.js";
