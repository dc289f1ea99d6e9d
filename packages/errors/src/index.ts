export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ValidationError,
  InvalidMetadataError,
  MissingCollectionError,
  ServerBusyError,
  DuplicateDocumentError,
  BackendError,
  PipelineConfigurationError,
} from "./errors.js";
