import { PDFParse } from "pdf-parse";
import type { ConversionResult, ConverterParams } from "@indexflow/types";
import type { IConverter } from "./converter.interface.js";
import { removeNumericTables } from "./numeric-tables.js";

/**
 * PDF text extraction through pdf-parse. Pages are joined with form feeds so
 * the preprocessor can find repeated headers and footers.
 */
export class PdfConverter implements IConverter {
  readonly kind = "pdf";

  async convert(input: Uint8Array, params: ConverterParams): Promise<ConversionResult> {
    const parser = new PDFParse({ data: input });

    try {
      const result = await parser.getText();
      const pages = result.pages.length > 0 ? result.pages.map((p) => p.text) : [result.text];
      const cleaned = params.removeNumericTables ? pages.map(removeNumericTables) : pages;

      return {
        text: cleaned.join("\f"),
        pageCount: result.total,
        metadata: {
          pageCount: result.total,
        },
      };
    } finally {
      await parser.destroy();
    }
  }
}
