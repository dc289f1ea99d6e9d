import { createHash } from "node:crypto";

/**
 * Content identity of a passage: equal content always yields the same id, so
 * writing it twice overwrites instead of duplicating.
 */
export function createDocumentId(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex").slice(0, 32);
}
