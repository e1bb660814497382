import { EncodingError, ValidationError } from "@docrag/errors";
import type { IExtractor } from "./extractor.interface.js";

/**
 * Decode bytes strictly: any invalid sequence fails instead of turning into
 * replacement characters. A byte order mark is kept as content.
 */
export function decodeStrict(input: Uint8Array, encoding: string): string {
  try {
    return new TextDecoder(encoding, { fatal: true, ignoreBOM: true }).decode(input);
  } catch (err) {
    throw new EncodingError(encoding, undefined, {
      details: { byteLength: input.byteLength },
      cause: err,
    });
  }
}

/**
 * Plain text passes through unchanged apart from decoding.
 */
export class TextExtractor implements IExtractor<"txt"> {
  readonly type = "txt";
  readonly encoding: string;

  constructor(encoding = "utf-8") {
    try {
      this.encoding = new TextDecoder(encoding).encoding;
    } catch (err) {
      throw new ValidationError(
        `Unknown text encoding: ${encoding}`,
        { encoding: "not a supported label" },
        { cause: err },
      );
    }
  }

  async extract(input: Uint8Array): Promise<string> {
    return decodeStrict(input, this.encoding);
  }
}
