const DIGIT_WORD_RATIO = 0.4;

/**
 * A line reads as a table row when more than 40% of its words contain a
 * digit. Lines ending with a full stop are kept: they are prose that happens
 * to quote numbers.
 */
export function isNumericTableRow(line: string): boolean {
  const words = line.split(/\s+/).filter((w) => w.length > 0);
  if (words.length === 0) return false;

  const digitWords = words.filter((w) => /\d/.test(w)).length;
  return digitWords / words.length > DIGIT_WORD_RATIO && !line.trim().endsWith(".");
}

export function removeNumericTables(text: string): string {
  return text
    .split("\n")
    .filter((line) => !isNumericTableRow(line))
    .join("\n");
}
