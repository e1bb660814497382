import type { EmbeddingsConfig } from "@docrag/types";
import { ValidationError } from "@docrag/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";

export function createEmbeddingProvider(config: EmbeddingsConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohereApiKey) {
        throw new ValidationError("Cohere API key is required when provider is 'cohere'", {
          cohereApiKey: "required",
        });
      }
      return new CohereEmbeddingProvider({
        apiKey: config.cohereApiKey,
        model: config.cohereModel,
        dimensions: config.dimensions,
      });
    case "bge-m3":
      if (!config.bgeM3Url) {
        throw new ValidationError("BGE-M3 URL is required when provider is 'bge-m3'", {
          bgeM3Url: "required",
        });
      }
      return new BgeM3EmbeddingProvider({
        baseUrl: config.bgeM3Url,
        dimensions: config.dimensions,
      });
    default:
      throw new ValidationError(`Unknown embedding provider: ${String(config.provider)}`, {
        provider: "unknown",
      });
  }
}
