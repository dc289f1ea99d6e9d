import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import { BackendError } from "@indexflow/errors";
import type { DuplicateDocumentsPolicy, IndexDocument } from "@indexflow/types";
import type { DocumentStoreOptions, IDocumentStore, WriteResult } from "./document-store.interface.js";
import { applyDuplicatePolicy, dedupeById, isRecord, toVector } from "./duplicates.js";

const BATCH_SIZE = 100;

/**
 * Qdrant point ids must be UUIDs or integers. 32-character hex content ids map
 * directly onto a UUID; anything else is hashed first.
 */
export function toPointId(documentId: string): string {
  const hex = /^[0-9a-f]{32}$/.test(documentId)
    ? documentId
    : createHash("sha256").update(documentId).digest("hex").slice(0, 32);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}

export class QdrantDocumentStore implements IDocumentStore {
  readonly name = "qdrant";
  private client: QdrantClient;

  constructor(
    connection: { url: string; apiKey?: string },
    private readonly options: DocumentStoreOptions,
  ) {
    this.client = new QdrantClient({ url: connection.url, apiKey: connection.apiKey });
  }

  async ensureCollection(collection: string): Promise<void> {
    if (await this.collectionExists(collection)) return;

    await this.call("create collection", () =>
      this.client.createCollection(collection, {
        vectors: {
          size: this.options.embeddingDim,
          distance: this.options.similarity === "dot_product" ? "Dot" : "Cosine",
        },
      }),
    );
    await this.call("index document ids", () =>
      this.client.createPayloadIndex(collection, {
        field_name: "document_id",
        field_schema: "keyword",
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
      const points = batch.map((doc) => {
        if (!doc.embedding) {
          throw new BackendError(`Document ${doc.id} has no embedding`, this.name);
        }
        return {
          id: toPointId(doc.id),
          vector: doc.embedding,
          payload: { document_id: doc.id, content: doc.content, meta: doc.meta },
        };
      });

      await this.call("upsert points", () =>
        this.client.upsert(collection, { wait: true, points }),
      );
    }

    return { written: toWrite.length, skipped: unique.length - toWrite.length };
  }

  async getDocumentsById(collection: string, ids: string[]): Promise<IndexDocument[]> {
    if (ids.length === 0) return [];
    const points = await this.call("retrieve points", () =>
      this.client.retrieve(collection, {
        ids: ids.map(toPointId),
        with_payload: true,
        with_vector: true,
      }),
    );

    return points.flatMap((point) => {
      const payload: Record<string, unknown> = point.payload ?? {};
      const documentId = payload.document_id;
      if (typeof documentId !== "string") return [];
      const content = payload.content;
      const meta = payload.meta;
      const doc: IndexDocument = {
        id: documentId,
        content: typeof content === "string" ? content : "",
        meta: isRecord(meta) ? meta : {},
      };
      const embedding = toVector(point.vector);
      if (embedding) doc.embedding = embedding;
      return [doc];
    });
  }

  async countDocuments(collection: string): Promise<number> {
    if (!(await this.collectionExists(collection))) return 0;
    const result = await this.call("count points", () =>
      this.client.count(collection, { exact: true }),
    );
    return result.count;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async collectionExists(collection: string): Promise<boolean> {
    const collections = await this.call("list collections", () => this.client.getCollections());
    return collections.collections.some((c) => c.name === collection);
  }

  private async existingIds(collection: string, documents: IndexDocument[]): Promise<Set<string>> {
    if (documents.length === 0) return new Set();
    const byPointId = new Map(documents.map((doc) => [toPointId(doc.id), doc.id]));
    const points = await this.call("look up existing points", () =>
      this.client.retrieve(collection, {
        ids: [...byPointId.keys()],
        with_payload: false,
        with_vector: false,
      }),
    );
    return new Set(
      points.flatMap((point) => {
        const id = byPointId.get(String(point.id));
        return id ? [id] : [];
      }),
    );
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof BackendError) throw err;
      throw new BackendError(`Qdrant failed to ${action}`, this.name, { cause: err });
    }
  }
}
