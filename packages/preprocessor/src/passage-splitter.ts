import type { ISplitter, SplitOptions } from "./splitter.interface.js";
import { windowed } from "./windowed.js";

/**
 * Groups `splitLength` paragraphs (blank-line separated blocks) per passage.
 */
export class PassageSplitter implements ISplitter {
  readonly unit = "passage";

  split(text: string, options: SplitOptions): string[] {
    const paragraphs = text
      .split(/\n\s*\n/)
      .map((p) => p.trim())
      .filter((p) => p.length > 0);

    return windowed(paragraphs, options.splitLength, options.splitOverlap).map((w) =>
      w.join("\n\n"),
    );
  }
}
