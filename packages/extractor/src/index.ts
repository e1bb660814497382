export type { IExtractor, ExtractorRegistry } from "./extractor.interface.js";
export { TextExtractor, decodeStrict } from "./text-extractor.js";
export { JsonExtractor, canonicalJson } from "./json-extractor.js";
export { DocxExtractor, joinParagraphs } from "./docx-extractor.js";
export { PdfOcrExtractor } from "./pdf-ocr-extractor.js";
export type { PdfOcrOptions } from "./pdf-ocr-extractor.js";
export { runCommand } from "./command-runner.js";
export type { CommandRunner, CommandResult } from "./command-runner.js";
export { createExtractors, documentTypeFromFilename, extractText } from "./registry.js";
