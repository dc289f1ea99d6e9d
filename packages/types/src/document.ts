/**
 * Free-form key/value metadata supplied by the caller with an upload and
 * copied onto every passage produced from it.
 */
export type Metadata = Record<string, unknown>;

export interface UploadedFile {
  /** Original filename as sent by the client. */
  filename: string;
  /** Temporary path the upload was written to. */
  path: string;
  sizeBytes: number;
}

export interface FileInput {
  path: string;
  meta: Metadata;
}

export interface IndexDocument {
  /** Content identity; documents with the same id overwrite each other. */
  id: string;
  content: string;
  meta: Metadata;
  embedding?: number[];
}

export type DuplicateDocumentsPolicy = "overwrite" | "skip" | "fail";

export type SimilarityMetric = "dot_product" | "cosine";

export interface ConversionResult {
  /** Normalized plain text; pages are separated by form feeds. */
  text: string;
  pageCount: number;
  metadata: Record<string, unknown>;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}
