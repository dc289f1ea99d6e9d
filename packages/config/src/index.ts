export { envSchema, parseEnv } from "./env.js";
export {
  DEFAULT_INDEXING_PARAMS,
  pipelineConfigSchema,
  resolveIndexingParams,
  loadPipelineConfig,
} from "./pipeline-config.js";
