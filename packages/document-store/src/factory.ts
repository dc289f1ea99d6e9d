import { readFileSync } from "node:fs";
import type { ClientOptions } from "@elastic/elasticsearch";
import type { DocumentStoreConfig, ElasticsearchConfig } from "@indexflow/types";
import type { DocumentStoreOptions, IDocumentStore } from "./document-store.interface.js";
import { ElasticsearchDocumentStore } from "./elasticsearch-store.js";
import { InMemoryDocumentStore } from "./memory-store.js";
import { QdrantDocumentStore } from "./qdrant-store.js";

export function elasticsearchClientOptions(config: ElasticsearchConfig): ClientOptions {
  const options: ClientOptions = {
    node: `${config.scheme}://${config.host}:${String(config.port)}`,
  };
  if (config.password) {
    options.auth = { username: config.username, password: config.password };
  }
  if (config.scheme === "https") {
    options.tls = {
      rejectUnauthorized: config.verifyCerts,
      ...(config.verifyCerts && config.caCerts ? { ca: readFileSync(config.caCerts) } : {}),
    };
  }
  return options;
}

export function createDocumentStore(config: DocumentStoreConfig): IDocumentStore {
  const options: DocumentStoreOptions = {
    embeddingDim: config.embeddingDim,
    similarity: config.similarity,
  };

  switch (config.type) {
    case "elasticsearch":
      return new ElasticsearchDocumentStore(elasticsearchClientOptions(config.elasticsearch), options);
    case "qdrant":
      if (!config.qdrant.url) {
        throw new Error("qdrant.url is required for Qdrant document store");
      }
      return new QdrantDocumentStore({ url: config.qdrant.url, apiKey: config.qdrant.apiKey }, options);
    case "memory":
      return new InMemoryDocumentStore(options);
    default:
      throw new Error(`Unknown document store type: ${String(config.type)}`);
  }
}
