import { z } from "zod";
import type { EmbeddingInputType, EmbeddingResult } from "@docrag/types";
import { ExternalServiceError, errorMessage } from "@docrag/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 1024;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  dimensions?: number;
  fetch?: typeof fetch;
}

const bgeM3ResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().int().nonnegative(),
});

/**
 * Self-hosted BGE-M3 model server reached over HTTP. The model embeds
 * documents and queries alike, so the input type is not sent.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly dimensions: number;
  private baseUrl: string;
  private fetchFn: typeof fetch;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.fetchFn = config.fetch ?? fetch;
  }

  async embed(text: string, inputType: EmbeddingInputType): Promise<EmbeddingResult> {
    return this.batchEmbed([text], inputType);
  }

  async batchEmbed(texts: string[], _inputType: EmbeddingInputType): Promise<EmbeddingResult> {
    let body: unknown;
    try {
      const response = await this.fetchFn(`${this.baseUrl}/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ texts, dimensions: this.dimensions }),
      });

      if (!response.ok) {
        throw new Error(`${String(response.status)} ${response.statusText}`);
      }
      body = await response.json();
    } catch (err) {
      throw new ExternalServiceError(`BGE-M3 embedding failed: ${errorMessage(err)}`, "bge-m3", {
        cause: err,
      });
    }

    const parsed = bgeM3ResponseSchema.safeParse(body);
    if (!parsed.success || parsed.data.embeddings.length !== texts.length) {
      throw new ExternalServiceError("BGE-M3 returned an unexpected response", "bge-m3");
    }

    return {
      embeddings: parsed.data.embeddings,
      model: "bge-m3",
      tokensUsed: parsed.data.tokens_used,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchFn(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
