import type { ISplitter, SplitOptions } from "./splitter.interface.js";
import { splitSentences } from "./sentence-splitter.js";
import { windowed } from "./windowed.js";

function countWords(text: string): number {
  return text.split(" ").filter((w) => w.length > 0).length;
}

/**
 * Word windows of `splitLength` words. With `splitRespectSentenceBoundary`
 * whole sentences are packed instead, so a passage only exceeds the length
 * when a single sentence does.
 */
export class WordSplitter implements ISplitter {
  readonly unit = "word";

  split(text: string, options: SplitOptions): string[] {
    if (options.splitRespectSentenceBoundary) {
      return this.splitBySentences(text, options);
    }

    const words = text.split(" ").filter((w) => w.length > 0);
    return windowed(words, options.splitLength, options.splitOverlap).map((w) => w.join(" "));
  }

  private splitBySentences(text: string, options: SplitOptions): string[] {
    const { splitLength, splitOverlap } = options;
    const slices: string[][] = [];
    let current: string[] = [];
    let wordCount = 0;

    for (const sentence of splitSentences(text)) {
      const sentenceWords = countWords(sentence);

      if (wordCount + sentenceWords > splitLength && current.length > 0) {
        slices.push(current);

        // Carry trailing sentences until the overlap is reached
        const overlap: string[] = [];
        let overlapWords = 0;
        for (let i = current.length - 1; i >= 0 && overlapWords < splitOverlap; i--) {
          const carried = current[i] ?? "";
          overlap.unshift(carried);
          overlapWords += countWords(carried);
        }
        current = overlap;
        wordCount = overlapWords;
      }

      current.push(sentence);
      wordCount += sentenceWords;
    }

    if (current.length > 0) {
      slices.push(current);
    }

    return slices.map((s) => s.join(" "));
  }
}
