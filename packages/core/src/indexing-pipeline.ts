import type { IDocumentStore } from "@indexflow/document-store";
import type { IEmbeddingProvider } from "@indexflow/embeddings";
import { createConverter } from "@indexflow/converters";
import { PipelineConfigurationError } from "@indexflow/errors";
import type { Logger } from "@indexflow/logger";
import {
  ROOT_NODE,
  type DuplicateDocumentsPolicy,
  type FileInput,
  type IndexingParams,
  type IndexingRunSummary,
} from "@indexflow/types";
import { PipelineGraph } from "./pipeline-graph.js";
import { resolveCollection } from "./metadata.js";
import { type ClassifyFn, FileTypeClassifierComponent } from "./components/file-type-classifier.js";
import { ConverterComponent, type ReadFileFn } from "./components/converter-component.js";
import { PreProcessorComponent } from "./components/preprocessor-component.js";
import { EmbeddingRetrieverComponent } from "./components/embedding-retriever.js";
import { DocumentStoreWriterComponent } from "./components/document-store-writer.js";

export const INDEXING_NODES = {
  classifier: "FileTypeClassifier",
  text: "TextConverter",
  pdf: "PDFToTextConverter",
  markdown: "MarkdownConverter",
  preprocessor: "PreProcessor",
  embedder: "EmbeddingRetriever",
  store: "DocumentStore",
} as const;

export interface IndexingDependencies {
  documentStore: IDocumentStore;
  embeddingProvider: IEmbeddingProvider;
  embeddingDim: number;
  duplicateDocuments: DuplicateDocumentsPolicy;
  logger: Logger;
  classify?: ClassifyFn;
  readFile?: ReadFileFn;
}

/**
 * Request-scoped indexing pipeline:
 * Classify -> Convert (text | pdf | markdown) -> Preprocess -> Embed -> Store
 */
export class IndexingPipeline {
  private disposed = false;

  constructor(
    private readonly graph: PipelineGraph,
    private readonly writer: DocumentStoreWriterComponent,
    private readonly logger: Logger,
  ) {}

  /**
   * Index files one after another into the collection named by the first
   * file. Documents written for earlier files stay written when a later file
   * fails.
   */
  async run(files: FileInput[]): Promise<IndexingRunSummary> {
    if (this.disposed) {
      throw new PipelineConfigurationError("Indexing pipeline has been disposed");
    }

    const collection = resolveCollection(files[0]?.meta);
    const before = this.writer.stats.written;
    let filesIndexed = 0;
    let filesDropped = 0;

    for (const input of files) {
      const file: FileInput = { ...input, meta: { ...input.meta, index: collection } };
      const result = await this.graph.run({ file, documents: [] });

      if (result.output === null) {
        filesDropped++;
        this.logger.warn(
          { file: file.meta["name"], visited: result.visited },
          "File dropped: no converter for its type",
        );
        continue;
      }

      filesIndexed++;
      this.logger.debug(
        { file: file.meta["name"], passages: result.output.documents.length },
        "File indexed",
      );
    }

    const summary: IndexingRunSummary = {
      collection,
      filesIndexed,
      filesDropped,
      documentsWritten: this.writer.stats.written - before,
    };
    this.logger.info(summary, "Indexing run complete");
    return summary;
  }

  dispose(): void {
    this.disposed = true;
  }
}

export function createIndexingPipeline(
  deps: IndexingDependencies,
  params: IndexingParams,
): IndexingPipeline {
  const writer = new DocumentStoreWriterComponent(
    deps.documentStore,
    deps.duplicateDocuments,
    deps.logger,
  );

  const graph = new PipelineGraph()
    .addNode(INDEXING_NODES.classifier, new FileTypeClassifierComponent(deps.logger, deps.classify), [
      ROOT_NODE,
    ])
    .addNode(
      INDEXING_NODES.text,
      new ConverterComponent(createConverter("text"), params.converter, deps.readFile),
      [`${INDEXING_NODES.classifier}.output_1`],
    )
    .addNode(
      INDEXING_NODES.pdf,
      new ConverterComponent(createConverter("pdf"), params.converter, deps.readFile),
      [`${INDEXING_NODES.classifier}.output_2`],
    )
    .addNode(
      INDEXING_NODES.markdown,
      new ConverterComponent(createConverter("markdown"), params.converter, deps.readFile),
      [`${INDEXING_NODES.classifier}.output_3`],
    )
    .addNode(INDEXING_NODES.preprocessor, new PreProcessorComponent(params.preprocessor), [
      INDEXING_NODES.text,
      INDEXING_NODES.pdf,
      INDEXING_NODES.markdown,
    ])
    .addNode(
      INDEXING_NODES.embedder,
      new EmbeddingRetrieverComponent(deps.embeddingProvider, deps.embeddingDim),
      [INDEXING_NODES.preprocessor],
    )
    .addNode(INDEXING_NODES.store, writer, [INDEXING_NODES.embedder]);

  graph.validate();
  return new IndexingPipeline(graph, writer, deps.logger);
}
