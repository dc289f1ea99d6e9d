import { marked } from "marked";
import type { Token } from "marked";
import type { ConversionResult, ConverterParams } from "@indexflow/types";
import type { IConverter } from "./converter.interface.js";

const HTML_ENTITIES: Record<string, string> = {
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " ",
};

/**
 * Markdown converter: renders to HTML with marked and keeps the text nodes.
 */
export class MarkdownConverter implements IConverter {
  readonly kind = "markdown";

  async convert(input: Uint8Array, params: ConverterParams): Promise<ConversionResult> {
    const markdown = new TextDecoder("utf-8").decode(input);
    const tokens: Token[] = marked.lexer(markdown, { gfm: true });
    const kept = params.removeCodeSnippets ? tokens.filter((t) => t.type !== "code") : tokens;
    const text = htmlToText(marked.parser(kept, { gfm: true }));

    return {
      text,
      pageCount: 1,
      metadata: {
        charCount: text.length,
      },
    };
  }
}

export function htmlToText(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&(?:lt|gt|quot|nbsp|#39);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .replace(/&#(\d+);/g, (_match, code: string) => String.fromCharCode(Number(code)))
    .replace(/&amp;/g, "&")
    .trim();
}
