import { readFile } from "node:fs/promises";
import type { IConverter } from "@indexflow/converters";
import { createDocumentId } from "@indexflow/preprocessor";
import type {
  ComponentOutput,
  ConverterParams,
  PipelineComponent,
  PipelineState,
} from "@indexflow/types";

export type ReadFileFn = (path: string) => Promise<Uint8Array>;

/**
 * Reads the stored upload and turns it into a single document carrying the
 * file's metadata.
 */
export class ConverterComponent implements PipelineComponent {
  readonly outgoingEdges = 1;

  constructor(
    private readonly converter: IConverter,
    private readonly params: ConverterParams,
    private readonly read: ReadFileFn = readFile,
  ) {}

  async run(state: PipelineState): Promise<ComponentOutput> {
    const bytes = await this.read(state.file.path);
    const result = await this.converter.convert(bytes, this.params);

    return {
      state: {
        ...state,
        documents: [
          {
            id: createDocumentId(result.text),
            content: result.text,
            meta: { ...state.file.meta },
          },
        ],
      },
      edge: "output_1",
    };
  }
}
