import { describe, it, expect } from "vitest";
import { DEFAULT_CHUNKING_CONFIG } from "@docrag/types";
import { parseEnv } from "./env.js";

function makeValidEnv(overrides: Record<string, string | undefined> = {}) {
  return {
    NODE_ENV: "test",
    PORT: "8000",
    LOG_LEVEL: "info",
    VECTOR_STORE: "qdrant",
    QDRANT_URL: "http://localhost:6333",
    QDRANT_API_KEY: "test-secret",
    EMBEDDING_PROVIDER: "cohere",
    COHERE_API_KEY: "test-cohere-key",
    ...overrides,
  };
}

describe("parseEnv", () => {
  it("parses valid env and returns AppConfig", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.port).toBe(8000);
    expect(config.logLevel).toBe("info");
    expect(config.vectorStore).toEqual({
      type: "qdrant",
      collectionName: "DocumentChunk",
      qdrantUrl: "http://localhost:6333",
      qdrantApiKey: "test-secret",
    });
    expect(config.embeddings).toEqual({
      provider: "cohere",
      dimensions: 1024,
      cohereApiKey: "test-cohere-key",
      cohereModel: "embed-english-v3.0",
      bgeM3Url: undefined,
    });
  });

  it("uses defaults for extraction, chunking and uploads", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.extraction).toEqual({
      tesseractCmd: "/usr/bin/tesseract",
      pdftoppmCmd: "pdftoppm",
      ocrDpi: 300,
      textEncoding: "utf-8",
    });
    expect(config.chunking).toEqual({ chunkSize: 500, chunkOverlap: 150 });
    expect(config.chunking).toEqual(DEFAULT_CHUNKING_CONFIG);
    expect(config.upload.maxBytes).toBe(26214400);
    expect(config.cors.origins).toBe("*");
  });

  it("defaults NODE_ENV, PORT and LOG_LEVEL", () => {
    const config = parseEnv(
      makeValidEnv({ NODE_ENV: undefined, PORT: undefined, LOG_LEVEL: undefined }),
    );

    expect(config.nodeEnv).toBe("development");
    expect(config.port).toBe(8000);
    expect(config.logLevel).toBe("info");
  });

  it("splits comma-separated CORS_ORIGINS", () => {
    const config = parseEnv(makeValidEnv({ CORS_ORIGINS: "https://a.com, https://b.com" }));

    expect(config.cors.origins).toEqual(["https://a.com", "https://b.com"]);
  });

  it("requires QDRANT_URL for the qdrant store", () => {
    expect(() => parseEnv(makeValidEnv({ QDRANT_URL: undefined }))).toThrow(
      /QDRANT_URL is required/,
    );
  });

  it("does not require QDRANT_URL for the memory store", () => {
    const config = parseEnv(makeValidEnv({ VECTOR_STORE: "memory", QDRANT_URL: undefined }));

    expect(config.vectorStore.type).toBe("memory");
    expect(config.vectorStore.qdrantUrl).toBeUndefined();
  });

  it("requires COHERE_API_KEY for the cohere provider", () => {
    expect(() => parseEnv(makeValidEnv({ COHERE_API_KEY: undefined }))).toThrow(
      /COHERE_API_KEY is required/,
    );
  });

  it("requires BGE_M3_URL for the bge-m3 provider", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3" }))).toThrow(
      /BGE_M3_URL is required/,
    );

    const config = parseEnv(
      makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3", BGE_M3_URL: "http://localhost:8080" }),
    );
    expect(config.embeddings.bgeM3Url).toBe("http://localhost:8080");
  });

  it("rejects an overlap larger than the chunk size", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "150" }))).toThrow(
      /CHUNK_OVERLAP must not exceed CHUNK_SIZE/,
    );
  });

  it("accepts a zero overlap", () => {
    const config = parseEnv(makeValidEnv({ CHUNK_OVERLAP: "0" }));
    expect(config.chunking.chunkOverlap).toBe(0);
  });

  it("rejects a non-numeric PORT", () => {
    expect(() => parseEnv(makeValidEnv({ PORT: "eighty" }))).toThrow();
  });

  it("rejects an invalid collection name", () => {
    expect(() => parseEnv(makeValidEnv({ COLLECTION_NAME: "1 chunks" }))).toThrow(
      /COLLECTION_NAME must be an identifier/,
    );
  });

  it("rejects invalid NODE_ENV", () => {
    expect(() => parseEnv(makeValidEnv({ NODE_ENV: "staging" }))).toThrow();
  });
});
