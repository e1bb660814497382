import { CohereClient } from "cohere-ai";
import type { EmbeddingInputType, EmbeddingResult } from "@docrag/types";
import { ExternalServiceError, errorMessage } from "@docrag/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-english-v3.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, inputType: EmbeddingInputType): Promise<EmbeddingResult> {
    return this.batchEmbed([text], inputType);
  }

  async batchEmbed(texts: string[], inputType: EmbeddingInputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      let response;
      try {
        response = await this.client.v2.embed({
          texts: batch,
          model: this.model,
          inputType,
          embeddingTypes: ["float"],
        });
      } catch (err) {
        throw new ExternalServiceError(`Cohere embed failed: ${errorMessage(err)}`, "cohere", {
          cause: err,
        });
      }

      const vectors = response.embeddings.float ?? [];
      if (vectors.length !== batch.length) {
        throw new ExternalServiceError(
          `Cohere returned ${String(vectors.length)} embeddings for ${String(batch.length)} texts`,
          "cohere",
        );
      }
      if (vectors.some((vector) => vector.length !== this.dimensions)) {
        throw new ExternalServiceError(
          `Cohere model ${this.model} does not produce ${String(this.dimensions)}-dimensional vectors`,
          "cohere",
        );
      }
      allEmbeddings.push(...vectors);

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check", "search_query");
      return true;
    } catch {
      return false;
    }
  }
}
