export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { SentenceTransformersEmbeddingProvider } from "./sentence-transformers-provider.js";
export type { SentenceTransformersProviderConfig } from "./sentence-transformers-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { createEmbeddingProvider } from "./factory.js";
