import type { DuplicateDocumentsPolicy, SimilarityMetric } from "./document.js";
import type { IndexingParams } from "./pipeline.js";

export type DocumentStoreType = "elasticsearch" | "qdrant" | "memory";

export type EmbeddingModelFormat = "sentence_transformers" | "cohere";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  rootPath: string;
  fileUploadPath: string;
  concurrentRequestsPerWorker: number;
  documentStore: DocumentStoreConfig;
  embedding: EmbeddingConfig;
  pipeline: IndexingParams;
}

export interface DocumentStoreConfig {
  type: DocumentStoreType;
  similarity: SimilarityMetric;
  embeddingDim: number;
  duplicateDocuments: DuplicateDocumentsPolicy;
  elasticsearch: ElasticsearchConfig;
  qdrant: QdrantConfig;
}

export interface ElasticsearchConfig {
  host: string;
  port: number;
  scheme: "http" | "https";
  username: string;
  password?: string;
  caCerts?: string;
  verifyCerts: boolean;
}

export interface QdrantConfig {
  url?: string;
  apiKey?: string;
}

export interface EmbeddingConfig {
  model: string;
  modelFormat: EmbeddingModelFormat;
  serverUrl?: string;
  cohereApiKey?: string;
  dimensions: number;
}
