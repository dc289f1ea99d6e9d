export { preprocess, cleanText, splitText } from "./preprocessor.js";
export {
  cleanWhitespace,
  cleanEmptyLines,
  removeHeaderFooter,
  findLongestCommonNgram,
} from "./cleaning.js";
export type { ISplitter, SplitOptions } from "./splitter.interface.js";
export { WordSplitter } from "./word-splitter.js";
export { SentenceSplitter, splitSentences } from "./sentence-splitter.js";
export { PassageSplitter } from "./passage-splitter.js";
export { createSplitter } from "./factory.js";
export { windowed } from "./windowed.js";
export { createDocumentId } from "./document-id.js";
