import { BackendError, PipelineConfigurationError } from "@indexflow/errors";
import type { IEmbeddingProvider } from "@indexflow/embeddings";
import type {
  ComponentOutput,
  PipelineComponent,
  PipelineState,
} from "@indexflow/types";

/**
 * Attaches a dense vector to every passage. The provider must produce vectors
 * of the size the document store was created with.
 */
export class EmbeddingRetrieverComponent implements PipelineComponent {
  readonly outgoingEdges = 1;

  constructor(
    private readonly provider: IEmbeddingProvider,
    private readonly embeddingDim: number,
  ) {
    if (provider.dimensions !== embeddingDim) {
      throw new PipelineConfigurationError(
        `Embedding model ${provider.model} produces ${String(provider.dimensions)}-dimension vectors but the document store expects ${String(embeddingDim)}`,
      );
    }
  }

  async run(state: PipelineState): Promise<ComponentOutput> {
    if (state.documents.length === 0) {
      return { state, edge: "output_1" };
    }

    const result = await this.provider.batchEmbed(state.documents.map((doc) => doc.content));

    const documents = state.documents.map((doc, i) => {
      const embedding = result.embeddings[i];
      if (!embedding || embedding.length !== this.embeddingDim) {
        throw new BackendError(
          `Embedding for passage ${String(i)} is missing or has the wrong dimension`,
          this.provider.name,
        );
      }
      return { ...doc, embedding };
    });

    return { state: { ...state, documents }, edge: "output_1" };
  }
}
