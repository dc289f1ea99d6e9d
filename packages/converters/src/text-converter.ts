import type { ConversionResult, ConverterParams } from "@indexflow/types";
import type { IConverter } from "./converter.interface.js";
import { removeNumericTables } from "./numeric-tables.js";

/**
 * Plain text converter. Decodes UTF-8; form feeds in the input are kept as
 * page breaks.
 */
export class TextConverter implements IConverter {
  readonly kind = "text";

  async convert(input: Uint8Array, params: ConverterParams): Promise<ConversionResult> {
    const decoded = new TextDecoder("utf-8").decode(input);
    const text = params.removeNumericTables ? removeNumericTables(decoded) : decoded;

    return {
      text,
      pageCount: text.split("\f").length,
      metadata: {
        charCount: text.length,
      },
    };
  }
}
