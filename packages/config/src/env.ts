import { z } from "zod";
import { DEFAULT_CHUNKING_CONFIG, type AppConfig } from "@docrag/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

/**
 * Zod schema for every environment variable the service reads. Validates,
 * transforms and provides defaults so the result maps onto {@link AppConfig}.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: positiveInt("8000"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
    QDRANT_URL: z.string().url("QDRANT_URL must be a URL").optional(),
    QDRANT_API_KEY: z.string().min(1).optional(),
    COLLECTION_NAME: z
      .string()
      .regex(/^[A-Za-z][A-Za-z0-9_-]*$/, "COLLECTION_NAME must be an identifier")
      .default("DocumentChunk"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    EMBEDDING_DIMENSIONS: positiveInt("1024"),
    COHERE_API_KEY: z.string().min(1).optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-english-v3.0"),
    BGE_M3_URL: z.string().url("BGE_M3_URL must be a URL").optional(),

    // ---------- Extraction ----------
    TESSERACT_CMD: z.string().min(1).default("/usr/bin/tesseract"),
    PDFTOPPM_CMD: z.string().min(1).default("pdftoppm"),
    OCR_DPI: positiveInt("300"),
    TEXT_ENCODING: z.string().min(1).default("utf-8"),

    // ---------- Chunking ----------
    CHUNK_SIZE: positiveInt(String(DEFAULT_CHUNKING_CONFIG.chunkSize)),
    CHUNK_OVERLAP: z
      .string()
      .default(String(DEFAULT_CHUNKING_CONFIG.chunkOverlap))
      .transform(Number)
      .pipe(z.number().int().nonnegative()),

    // ---------- HTTP ----------
    MAX_UPLOAD_BYTES: positiveInt("26214400"),
    CORS_ORIGINS: z
      .string()
      .default("*")
      .transform((val) =>
        val.trim() === "*"
          ? ("*" as const)
          : val
              .split(",")
              .map((origin) => origin.trim())
              .filter((origin) => origin.length > 0),
      ),
  })
  .superRefine((env, ctx) => {
    if (env.VECTOR_STORE === "qdrant" && !env.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required when VECTOR_STORE is qdrant",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
    if (env.EMBEDDING_PROVIDER === "bge-m3" && !env.BGE_M3_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
      });
    }
    if (env.CHUNK_OVERLAP > env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must not exceed CHUNK_SIZE",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) and return a
 * strongly-typed {@link AppConfig}. Throws a ZodError listing every problem.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,

    vectorStore: {
      type: parsed.VECTOR_STORE,
      collectionName: parsed.COLLECTION_NAME,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
    },

    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      cohereApiKey: parsed.COHERE_API_KEY,
      cohereModel: parsed.COHERE_EMBED_MODEL,
      bgeM3Url: parsed.BGE_M3_URL,
    },

    extraction: {
      tesseractCmd: parsed.TESSERACT_CMD,
      pdftoppmCmd: parsed.PDFTOPPM_CMD,
      ocrDpi: parsed.OCR_DPI,
      textEncoding: parsed.TEXT_ENCODING,
    },

    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
    },

    upload: {
      maxBytes: parsed.MAX_UPLOAD_BYTES,
    },

    cors: {
      origins: parsed.CORS_ORIGINS,
    },
  };
}
