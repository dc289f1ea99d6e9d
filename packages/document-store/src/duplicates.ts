import { DuplicateDocumentError } from "@indexflow/errors";
import type { DuplicateDocumentsPolicy, IndexDocument } from "@indexflow/types";

/** Later documents in a batch replace earlier ones with the same id. */
export function dedupeById(documents: IndexDocument[]): IndexDocument[] {
  const byId = new Map<string, IndexDocument>();
  for (const doc of documents) {
    byId.delete(doc.id);
    byId.set(doc.id, doc);
  }
  return [...byId.values()];
}

/**
 * Apply the duplicate policy against the ids already stored. Returns the
 * documents that should be written.
 */
export function applyDuplicatePolicy(
  collection: string,
  documents: IndexDocument[],
  existingIds: ReadonlySet<string>,
  policy: DuplicateDocumentsPolicy,
): IndexDocument[] {
  switch (policy) {
    case "overwrite":
      return documents;
    case "skip":
      return documents.filter((doc) => !existingIds.has(doc.id));
    case "fail": {
      const clashes = documents.filter((doc) => existingIds.has(doc.id)).map((doc) => doc.id);
      if (clashes.length > 0) {
        throw new DuplicateDocumentError(collection, clashes);
      }
      return documents;
    }
    default:
      throw new Error(`Unknown duplicate documents policy: ${String(policy)}`);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toVector(value: unknown): number[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const vector: number[] = [];
  for (const item of value) {
    if (typeof item !== "number") return undefined;
    vector.push(item);
  }
  return vector;
}
