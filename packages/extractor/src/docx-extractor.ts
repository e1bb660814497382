import mammoth from "mammoth";
import { ExtractionError, errorMessage } from "@docrag/errors";
import type { IExtractor } from "./extractor.interface.js";

// mammoth ends every paragraph of its raw text with a blank line
const PARAGRAPH_END = "\n\n";

/**
 * Paragraph texts joined by single spaces, in document order. Empty
 * paragraphs still count, so two of them in a row leave two spaces.
 */
export function joinParagraphs(rawText: string): string {
  const paragraphs = rawText.split(PARAGRAPH_END);
  if (paragraphs[paragraphs.length - 1] === "") {
    paragraphs.pop();
  }
  return paragraphs.join(" ");
}

export class DocxExtractor implements IExtractor<"docx"> {
  readonly type = "docx";

  async extract(input: Uint8Array): Promise<string> {
    let rawText: string;
    try {
      const result = await mammoth.extractRawText({ buffer: Buffer.from(input) });
      rawText = result.value;
    } catch (err) {
      throw new ExtractionError(`Failed to read DOCX: ${errorMessage(err)}`, { cause: err });
    }

    return joinParagraphs(rawText);
  }
}
