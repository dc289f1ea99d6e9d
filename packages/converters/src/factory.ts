import type { IConverter, ConvertibleKind } from "./converter.interface.js";
import { TextConverter } from "./text-converter.js";
import { PdfConverter } from "./pdf-converter.js";
import { MarkdownConverter } from "./markdown-converter.js";

export function createConverter(kind: ConvertibleKind): IConverter {
  switch (kind) {
    case "text":
      return new TextConverter();
    case "pdf":
      return new PdfConverter();
    case "markdown":
      return new MarkdownConverter();
    default:
      throw new Error(`Unknown converter kind: ${String(kind)}`);
  }
}
