import { open } from "node:fs/promises";
import { extname } from "node:path";
import { fileTypeFromFile } from "file-type";
import type { FileClassification, FileKind } from "@indexflow/types";

type KnownKind = Exclude<FileKind, "unknown">;

const TEXT_SNIFF_BYTES = 4096;

const EXTENSION_KINDS: Readonly<Record<string, KnownKind>> = {
  txt: "text",
  text: "text",
  pdf: "pdf",
  md: "markdown",
  markdown: "markdown",
  docx: "docx",
  html: "html",
  htm: "html",
};

export function classifyExtension(extension: string): FileClassification {
  const normalized = extension.replace(/^\./, "").toLowerCase();
  const kind = EXTENSION_KINDS[normalized];

  if (!kind) {
    return { kind: "unknown", extension: normalized || null };
  }
  return { kind, extension: normalized };
}

/**
 * Classify a stored upload. The extension decides; files without one are
 * sniffed by their magic bytes.
 */
export async function classifyFile(path: string): Promise<FileClassification> {
  const extension = extname(path);
  if (extension.length > 1) {
    return classifyExtension(extension);
  }

  const sniffed = await fileTypeFromFile(path);
  if (sniffed) {
    return classifyExtension(sniffed.ext);
  }
  if (await looksLikeText(path)) {
    return { kind: "text", extension: "txt" };
  }
  return { kind: "unknown", extension: null };
}

/**
 * file-type only knows binary signatures. A file it cannot place is treated as
 * plain text when its first bytes are valid UTF-8 without NUL bytes.
 */
export async function looksLikeText(path: string): Promise<boolean> {
  const handle = await open(path, "r");
  try {
    const buffer = new Uint8Array(TEXT_SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, TEXT_SNIFF_BYTES, 0);
    return isUtf8Text(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

export function isUtf8Text(bytes: Uint8Array): boolean {
  if (bytes.includes(0)) return false;
  try {
    // stream: a multi-byte character cut at the end of the sample is not an error
    new TextDecoder("utf-8", { fatal: true }).decode(bytes, { stream: true });
    return true;
  } catch {
    return false;
  }
}
