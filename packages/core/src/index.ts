export { PipelineGraph, parseInputRef } from "./pipeline-graph.js";
export {
  IndexingPipeline,
  createIndexingPipeline,
  INDEXING_NODES,
} from "./indexing-pipeline.js";
export type { IndexingDependencies } from "./indexing-pipeline.js";
export { parseMetadata, resolveCollection, buildFileInputs } from "./metadata.js";
export {
  FileTypeClassifierComponent,
  edgeForClassification,
} from "./components/file-type-classifier.js";
export type { ClassifyFn } from "./components/file-type-classifier.js";
export { ConverterComponent } from "./components/converter-component.js";
export type { ReadFileFn } from "./components/converter-component.js";
export { PreProcessorComponent } from "./components/preprocessor-component.js";
export { EmbeddingRetrieverComponent } from "./components/embedding-retriever.js";
export { DocumentStoreWriterComponent } from "./components/document-store-writer.js";
