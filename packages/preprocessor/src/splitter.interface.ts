import type { SplitBy } from "@indexflow/types";

export interface SplitOptions {
  splitLength: number;
  splitOverlap: number;
  splitRespectSentenceBoundary: boolean;
}

export interface ISplitter {
  readonly unit: SplitBy;
  split(text: string, options: SplitOptions): string[];
}
