import { BackendError } from "@indexflow/errors";
import type { DuplicateDocumentsPolicy, IndexDocument } from "@indexflow/types";
import type { DocumentStoreOptions, IDocumentStore, WriteResult } from "./document-store.interface.js";
import { applyDuplicatePolicy, dedupeById } from "./duplicates.js";

/** Process-local store for tests and local runs. */
export class InMemoryDocumentStore implements IDocumentStore {
  readonly name = "memory";
  private collections = new Map<string, Map<string, IndexDocument>>();

  constructor(private readonly options: Pick<DocumentStoreOptions, "embeddingDim">) {}

  async ensureCollection(collection: string): Promise<void> {
    this.collection(collection);
  }

  async writeDocuments(
    collection: string,
    documents: IndexDocument[],
    policy: DuplicateDocumentsPolicy,
  ): Promise<WriteResult> {
    const stored = this.collection(collection);

    const unique = dedupeById(documents);
    for (const doc of unique) {
      if (doc.embedding && doc.embedding.length !== this.options.embeddingDim) {
        throw new BackendError(
          `Document ${doc.id} has a ${String(doc.embedding.length)}-dimension embedding, collection "${collection}" expects ${String(this.options.embeddingDim)}`,
          this.name,
        );
      }
    }

    const toWrite = applyDuplicatePolicy(collection, unique, new Set(stored.keys()), policy);
    for (const doc of toWrite) {
      stored.set(doc.id, structuredClone(doc));
    }

    return { written: toWrite.length, skipped: unique.length - toWrite.length };
  }

  async getDocumentsById(collection: string, ids: string[]): Promise<IndexDocument[]> {
    const stored = this.collections.get(collection);
    if (!stored) return [];
    return ids.flatMap((id) => {
      const doc = stored.get(id);
      return doc ? [structuredClone(doc)] : [];
    });
  }

  async countDocuments(collection: string): Promise<number> {
    return this.collections.get(collection)?.size ?? 0;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Names of collections that have been created, in creation order. */
  listCollections(): string[] {
    return [...this.collections.keys()];
  }

  private collection(name: string): Map<string, IndexDocument> {
    let stored = this.collections.get(name);
    if (!stored) {
      stored = new Map();
      this.collections.set(name, stored);
    }
    return stored;
  }
}
