import type { EmbeddingConfig } from "@indexflow/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { SentenceTransformersEmbeddingProvider } from "./sentence-transformers-provider.js";

/**
 * Select the provider by the model's framework tag.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): IEmbeddingProvider {
  switch (config.modelFormat) {
    case "sentence_transformers":
      if (!config.serverUrl) {
        throw new Error("An embedding server URL is required for sentence_transformers models");
      }
      return new SentenceTransformersEmbeddingProvider({
        baseUrl: config.serverUrl,
        model: config.model,
        dimensions: config.dimensions,
      });
    case "cohere":
      if (!config.cohereApiKey) {
        throw new Error("A Cohere API key is required for cohere models");
      }
      return new CohereEmbeddingProvider({
        apiKey: config.cohereApiKey,
        model: config.model,
        dimensions: config.dimensions,
      });
    default:
      throw new Error(`Unknown embedding model format: ${String(config.modelFormat)}`);
  }
}
