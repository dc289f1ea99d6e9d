import { InvalidMetadataError, MissingCollectionError } from "@indexflow/errors";
import type { FileInput, Metadata, UploadedFile } from "@indexflow/types";

/**
 * Decode the `meta` form field. Absent, empty and `null` mean no metadata;
 * anything that is not a JSON object is rejected.
 */
export function parseMetadata(raw: string | undefined): Metadata {
  if (raw === undefined || raw.trim() === "") return {};

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw new InvalidMetadataError(`Metadata is not valid JSON: ${raw}`, { cause: err });
  }

  if (decoded === null) return {};
  if (typeof decoded !== "object" || Array.isArray(decoded)) {
    const kind = Array.isArray(decoded) ? "array" : typeof decoded;
    throw new InvalidMetadataError(`Metadata must be a JSON object, got ${kind}: ${raw}`);
  }

  return Object.fromEntries(Object.entries(decoded));
}

/** The target collection is the `index` of the first file's metadata. */
export function resolveCollection(meta: Metadata | undefined): string {
  const index = meta?.["index"];
  if (typeof index !== "string" || index.trim() === "") {
    throw new MissingCollectionError();
  }
  return index;
}

/**
 * Give every stored upload its own copy of the request metadata, tagged with
 * the original filename and the batch's collection.
 */
export function buildFileInputs(files: UploadedFile[], meta: Metadata): FileInput[] {
  const collection = resolveCollection(meta);
  return files.map((file) => ({
    path: file.path,
    meta: { ...structuredClone(meta), name: file.filename, index: collection },
  }));
}
