import type { SplitBy } from "@indexflow/types";
import type { ISplitter } from "./splitter.interface.js";
import { WordSplitter } from "./word-splitter.js";
import { SentenceSplitter } from "./sentence-splitter.js";
import { PassageSplitter } from "./passage-splitter.js";

export function createSplitter(unit: SplitBy): ISplitter {
  switch (unit) {
    case "word":
      return new WordSplitter();
    case "sentence":
      return new SentenceSplitter();
    case "passage":
      return new PassageSplitter();
    default:
      throw new Error(`Unknown split unit: ${String(unit)}`);
  }
}
