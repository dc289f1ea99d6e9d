import { ValidationError } from "@indexflow/errors";

export function assertOverlapBelowLength(length: number, overlap: number): void {
  if (overlap >= length) {
    const message = `splitOverlap (${String(overlap)}) must be smaller than splitLength (${String(length)})`;
    throw new ValidationError(message, { splitOverlap: message });
  }
}

/**
 * Fixed-size windows over `elements` advancing by `length - overlap`. The last
 * window may be shorter; no window starts past the end.
 */
export function windowed<T>(elements: T[], length: number, overlap: number): T[][] {
  assertOverlapBelowLength(length, overlap);

  const step = length - overlap;
  const windows: T[][] = [];

  for (let start = 0; start < elements.length; start += step) {
    windows.push(elements.slice(start, start + length));
    if (start + length >= elements.length) break;
  }

  return windows;
}
