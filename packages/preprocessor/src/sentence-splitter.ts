import type { ISplitter, SplitOptions } from "./splitter.interface.js";
import { windowed } from "./windowed.js";

const SENTENCE_REGEX = /(?<=[.!?])\s+(?=["'([]?[A-Z0-9])/;

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_REGEX)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Groups `splitLength` sentences per passage.
 */
export class SentenceSplitter implements ISplitter {
  readonly unit = "sentence";

  split(text: string, options: SplitOptions): string[] {
    return windowed(splitSentences(text), options.splitLength, options.splitOverlap).map((w) =>
      w.join(" "),
    );
  }
}
