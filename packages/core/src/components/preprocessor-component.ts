import { preprocess } from "@indexflow/preprocessor";
import type {
  ComponentOutput,
  PipelineComponent,
  PipelineState,
  PreprocessorParams,
} from "@indexflow/types";

export class PreProcessorComponent implements PipelineComponent {
  readonly outgoingEdges = 1;

  constructor(private readonly params: PreprocessorParams) {}

  async run(state: PipelineState): Promise<ComponentOutput> {
    const documents = state.documents.flatMap((doc) => preprocess(doc, this.params));
    return { state: { ...state, documents }, edge: "output_1" };
  }
}
