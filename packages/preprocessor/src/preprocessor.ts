import type { IndexDocument, PreprocessorParams } from "@indexflow/types";
import { cleanEmptyLines, cleanWhitespace, removeHeaderFooter } from "./cleaning.js";
import { createSplitter } from "./factory.js";
import { createDocumentId } from "./document-id.js";
import { assertOverlapBelowLength } from "./windowed.js";

/**
 * Applies the enabled cleaning passes to a converted document.
 * Header/footer detection runs first: it relies on the raw page layout.
 */
export function cleanText(text: string, params: PreprocessorParams): string {
  let cleaned = text;
  if (params.cleanHeaderFooter) cleaned = removeHeaderFooter(cleaned);
  if (params.cleanWhitespace) cleaned = cleanWhitespace(cleaned);
  if (params.cleanEmptyLines) cleaned = cleanEmptyLines(cleaned);
  return cleaned;
}

/**
 * Split a cleaned text into passage strings in document order.
 */
export function splitText(text: string, params: PreprocessorParams): string[] {
  const passages =
    params.splitBy === null
      ? [text]
      : createSplitter(params.splitBy).split(text, {
          splitLength: params.splitLength,
          splitOverlap: params.splitOverlap,
          splitRespectSentenceBoundary:
            params.splitBy === "word" && params.splitRespectSentenceBoundary,
        });

  return passages.map((p) => p.replace(/\f/g, "\n").trim()).filter((p) => p.length > 0);
}

/**
 * Turn one converted document into passages. Each passage inherits the
 * document metadata plus its position (`_split_id`) and gets a content id.
 */
export function preprocess(document: IndexDocument, params: PreprocessorParams): IndexDocument[] {
  assertOverlapBelowLength(params.splitLength, params.splitOverlap);

  const passages = splitText(cleanText(document.content, params), params);

  return passages.map((content, i) => ({
    id: createDocumentId(content),
    content,
    meta: { ...document.meta, _split_id: i },
  }));
}
