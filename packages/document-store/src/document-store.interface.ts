import type { DuplicateDocumentsPolicy, IndexDocument } from "@indexflow/types";

export interface WriteResult {
  written: number;
  skipped: number;
}

export interface IDocumentStore {
  readonly name: string;

  /** Create the collection with the store's similarity and dimension when missing. */
  ensureCollection(collection: string): Promise<void>;
  writeDocuments(
    collection: string,
    documents: IndexDocument[],
    policy: DuplicateDocumentsPolicy,
  ): Promise<WriteResult>;
  getDocumentsById(collection: string, ids: string[]): Promise<IndexDocument[]>;
  countDocuments(collection: string): Promise<number>;
  healthCheck(): Promise<boolean>;
}

export interface DocumentStoreOptions {
  embeddingDim: number;
  similarity: "dot_product" | "cosine";
}
