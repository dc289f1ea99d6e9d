const HEADER_FOOTER_CHARS = 300;
const MIN_NGRAM = 3;
const MAX_NGRAM = 30;

/** Strip every line and collapse runs of spaces and tabs. */
export function cleanWhitespace(text: string): string {
  return text
    .split("\f")
    .map((page) =>
      page
        .split("\n")
        .map((line) => line.replace(/[ \t]+/g, " ").trim())
        .join("\n"),
    )
    .join("\f");
}

/** Collapse runs of blank lines into a single paragraph break. */
export function cleanEmptyLines(text: string): string {
  return text.replace(/\n\n+/g, "\n\n");
}

/**
 * Word n-grams of `seq` for every n in [minN, maxN). Newlines and tabs stay
 * attached to the word that follows them.
 */
function allNgrams(seq: string, minN: number, maxN: number): Set<string> {
  const words = seq.replace(/\n/g, " \n").replace(/\t/g, " \t").split(" ");
  const ngrams = new Set<string>();

  for (let n = minN; n < maxN; n++) {
    for (let i = 0; i + n <= words.length; i++) {
      ngrams.add(
        words
          .slice(i, i + n)
          .join(" ")
          .replace(/ \n/g, "\n")
          .replace(/ \t/g, "\t"),
      );
    }
  }

  return ngrams;
}

export function findLongestCommonNgram(sequences: string[]): string | null {
  const nonEmpty = sequences.filter((s) => s.length > 0);
  if (nonEmpty.length < 2) return null;

  const [first, ...rest] = nonEmpty.map((s) => allNgrams(s, MIN_NGRAM, MAX_NGRAM));
  if (!first) return null;

  let longest: string | null = null;
  for (const candidate of first) {
    if (!rest.every((set) => set.has(candidate))) continue;
    if (longest === null || candidate.length > longest.length) {
      longest = candidate;
    }
  }

  return longest !== null && longest.trim().length > 0 ? longest : null;
}

/**
 * Remove text repeated at the start (header) and end (footer) of pages.
 * The first and last pages are not used to detect them, since title and
 * closing pages often differ.
 */
export function removeHeaderFooter(text: string): string {
  let pages = text.split("\f");
  const inner = pages.slice(1, -1);

  const header = findLongestCommonNgram(inner.map((p) => p.slice(0, HEADER_FOOTER_CHARS)));
  if (header) {
    pages = pages.map((p) => p.replaceAll(header, ""));
  }

  const footer = findLongestCommonNgram(
    pages.slice(1, -1).map((p) => p.slice(-HEADER_FOOTER_CHARS)),
  );
  if (footer) {
    pages = pages.map((p) => p.replaceAll(footer, ""));
  }

  return pages.join("\f");
}
