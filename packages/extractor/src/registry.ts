import { isDocumentType, type DocumentType, type ExtractionConfig } from "@docrag/types";
import { UnsupportedFormatError } from "@docrag/errors";
import type { ExtractorRegistry } from "./extractor.interface.js";
import { TextExtractor } from "./text-extractor.js";
import { JsonExtractor } from "./json-extractor.js";
import { DocxExtractor } from "./docx-extractor.js";
import { PdfOcrExtractor } from "./pdf-ocr-extractor.js";
import type { CommandRunner } from "./command-runner.js";

export function createExtractors(
  config: Partial<ExtractionConfig> = {},
  run?: CommandRunner,
): ExtractorRegistry {
  return {
    pdf: new PdfOcrExtractor({
      tesseractCmd: config.tesseractCmd,
      pdftoppmCmd: config.pdftoppmCmd,
      dpi: config.ocrDpi,
      run,
    }),
    docx: new DocxExtractor(),
    txt: new TextExtractor(config.textEncoding),
    json: new JsonExtractor(),
  };
}

/**
 * The declared type is the text after the last dot of the file name.
 * Content is never sniffed.
 */
export function documentTypeFromFilename(filename: string): DocumentType {
  const dot = filename.lastIndexOf(".");
  const extension = dot >= 0 ? filename.slice(dot + 1).toLowerCase() : "";

  if (!isDocumentType(extension)) {
    throw new UnsupportedFormatError(extension);
  }
  return extension;
}

/**
 * Dispatch on the declared type. Anything outside pdf, docx, txt and json
 * is rejected before any bytes are read.
 */
export async function extractText(
  registry: ExtractorRegistry,
  input: Uint8Array,
  declaredType: string,
): Promise<string> {
  if (!isDocumentType(declaredType)) {
    throw new UnsupportedFormatError(declaredType);
  }
  return registry[declaredType].extract(input);
}
