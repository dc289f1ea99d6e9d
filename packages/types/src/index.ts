export type {
  Metadata,
  UploadedFile,
  FileInput,
  IndexDocument,
  DuplicateDocumentsPolicy,
  SimilarityMetric,
  ConversionResult,
  EmbeddingResult,
} from "./document.js";

export { ROOT_NODE } from "./pipeline.js";
export type {
  OutputEdge,
  PipelineState,
  ComponentOutput,
  PipelineComponent,
  PipelineRunResult,
  FileKind,
  FileClassification,
  ConverterParams,
  SplitBy,
  PreprocessorParams,
  IndexingParams,
  IndexingRunSummary,
} from "./pipeline.js";

export type { ApiResponse, ApiError, HealthCheckResult } from "./api.js";

export type {
  AppConfig,
  DocumentStoreType,
  EmbeddingModelFormat,
  DocumentStoreConfig,
  ElasticsearchConfig,
  QdrantConfig,
  EmbeddingConfig,
} from "./config.js";
