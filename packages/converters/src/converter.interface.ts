import type { ConversionResult, ConverterParams } from "@indexflow/types";

/** File kinds that have a converter bound in the indexing pipeline. */
export type ConvertibleKind = "text" | "pdf" | "markdown";

export interface IConverter {
  readonly kind: ConvertibleKind;
  convert(input: Uint8Array, params: ConverterParams): Promise<ConversionResult>;
}
