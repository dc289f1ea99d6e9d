export type {
  IDocumentStore,
  DocumentStoreOptions,
  WriteResult,
} from "./document-store.interface.js";
export { ElasticsearchDocumentStore } from "./elasticsearch-store.js";
export { QdrantDocumentStore, toPointId } from "./qdrant-store.js";
export { InMemoryDocumentStore } from "./memory-store.js";
export { applyDuplicatePolicy, dedupeById } from "./duplicates.js";
export { createDocumentStore, elasticsearchClientOptions } from "./factory.js";
