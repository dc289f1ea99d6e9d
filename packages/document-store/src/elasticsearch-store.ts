import { Client } from "@elastic/elasticsearch";
import type { ClientOptions, estypes } from "@elastic/elasticsearch";
import { BackendError } from "@indexflow/errors";
import type { DuplicateDocumentsPolicy, IndexDocument } from "@indexflow/types";
import type { DocumentStoreOptions, IDocumentStore, WriteResult } from "./document-store.interface.js";
import { applyDuplicatePolicy, dedupeById, isRecord, toVector } from "./duplicates.js";

const BATCH_SIZE = 500;

interface StoredDocument {
  content: string;
  meta: Record<string, unknown>;
  embedding?: number[];
}

/**
 * Elasticsearch-backed store. Passages live in one index per collection with a
 * `dense_vector` field. Unnormalized dot-product models are mapped to
 * `max_inner_product`; Elasticsearch's `dot_product` rejects non-unit vectors.
 */
export class ElasticsearchDocumentStore implements IDocumentStore {
  readonly name = "elasticsearch";
  private client: Client;

  constructor(
    clientOptions: ClientOptions,
    private readonly options: DocumentStoreOptions,
  ) {
    this.client = new Client(clientOptions);
  }

  async ensureCollection(collection: string): Promise<void> {
    const exists = await this.call("check index", () =>
      this.client.indices.exists({ index: collection }),
    );
    if (exists) return;

    await this.call("create index", () =>
      this.client.indices.create({
        index: collection,
        mappings: {
          properties: {
            content: { type: "text" },
            meta: { type: "object", dynamic: true },
            embedding: {
              type: "dense_vector",
              dims: this.options.embeddingDim,
              index: true,
              similarity: this.options.similarity === "dot_product" ? "max_inner_product" : "cosine",
            },
          },
        },
      }),
    );
  }

  async writeDocuments(
    collection: string,
    documents: IndexDocument[],
    policy: DuplicateDocumentsPolicy,
  ): Promise<WriteResult> {
    await this.ensureCollection(collection);

    const unique = dedupeById(documents);
    const existing =
      policy === "overwrite" ? new Set<string>() : await this.existingIds(collection, unique);
    const toWrite = applyDuplicatePolicy(collection, unique, existing, policy);

    for (let i = 0; i < toWrite.length; i += BATCH_SIZE) {
      const batch = toWrite.slice(i, i + BATCH_SIZE);
      const operations: Array<estypes.BulkOperationContainer | StoredDocument> = [];
      for (const doc of batch) {
        const source: StoredDocument = { content: doc.content, meta: doc.meta };
        if (doc.embedding) source.embedding = doc.embedding;
        operations.push({ index: { _index: collection, _id: doc.id } }, source);
      }

      const response = await this.call("bulk write", () =>
        this.client.bulk<StoredDocument>({ operations, refresh: "wait_for" }),
      );

      if (response.errors) {
        const failures = response.items.flatMap((item) => {
          const result = item.index;
          return result?.error ? [`${String(result._id)}: ${result.error.reason ?? result.error.type}`] : [];
        });
        throw new BackendError(
          `Bulk write to "${collection}" failed for ${String(failures.length)} documents: ${failures.slice(0, 5).join("; ")}`,
          this.name,
        );
      }
    }

    return { written: toWrite.length, skipped: unique.length - toWrite.length };
  }

  async getDocumentsById(collection: string, ids: string[]): Promise<IndexDocument[]> {
    if (ids.length === 0) return [];
    const response = await this.call("fetch documents", () =>
      this.client.mget<StoredDocument>({ index: collection, ids }),
    );

    return response.docs.flatMap((item) => {
      if (!("found" in item) || !item.found || !item._source) return [];
      const source = item._source;
      const doc: IndexDocument = {
        id: item._id,
        content: source.content,
        meta: isRecord(source.meta) ? source.meta : {},
      };
      const embedding = toVector(source.embedding);
      if (embedding) doc.embedding = embedding;
      return [doc];
    });
  }

  async countDocuments(collection: string): Promise<number> {
    const exists = await this.call("check index", () =>
      this.client.indices.exists({ index: collection }),
    );
    if (!exists) return 0;
    const response = await this.call("count documents", () =>
      this.client.count({ index: collection }),
    );
    return response.count;
  }

  async healthCheck(): Promise<boolean> {
    try {
      return await this.client.ping();
    } catch {
      return false;
    }
  }

  private async existingIds(collection: string, documents: IndexDocument[]): Promise<Set<string>> {
    if (documents.length === 0) return new Set();
    const response = await this.call("look up existing documents", () =>
      this.client.mget({ index: collection, ids: documents.map((doc) => doc.id), _source: false }),
    );
    return new Set(
      response.docs.flatMap((item) => ("found" in item && item.found ? [item._id] : [])),
    );
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new BackendError(`Elasticsearch failed to ${action}`, this.name, { cause: err });
    }
  }
}
