import { isLosslessNumber, parse } from "lossless-json";
import { MalformedInputError, errorMessage } from "@docrag/errors";
import type { IExtractor } from "./extractor.interface.js";
import { decodeStrict } from "./text-extractor.js";

/**
 * Serialize a parsed JSON value with one space after every `,` and `:` and
 * no other whitespace, so `{"a":1}` and a pretty-printed copy of it produce
 * the same text. Numbers parsed by lossless-json are written from their
 * source text, so `1.0`, `1e400` and integers above 2^53 survive unchanged.
 */
export function canonicalJson(value: unknown): string {
  if (isLosslessNumber(value)) {
    return value.value;
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(", ")}]`;
  }

  if (typeof value === "object" && value !== null) {
    const members = Object.entries(value).map(
      ([key, member]) => `${JSON.stringify(key)}: ${canonicalJson(member)}`,
    );
    return `{${members.join(", ")}}`;
  }

  return JSON.stringify(value);
}

export class JsonExtractor implements IExtractor<"json"> {
  readonly type = "json";

  async extract(input: Uint8Array): Promise<string> {
    const source = decodeStrict(input, "utf-8");

    let parsed: unknown;
    try {
      parsed = parse(source);
    } catch (err) {
      throw new MalformedInputError(`Invalid JSON: ${errorMessage(err)}`, { cause: err });
    }

    return canonicalJson(parsed);
  }
}
