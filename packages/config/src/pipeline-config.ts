import { readFileSync } from "node:fs";
import { z } from "zod";
import { ValidationError } from "@indexflow/errors";
import type { IndexingParams } from "@indexflow/types";

/**
 * Defaults of the indexing pipeline: converters keep numeric tables and drop
 * fenced code; the preprocessor cleans everything and emits passages of at
 * most 50 sentences without overlap.
 */
export const DEFAULT_INDEXING_PARAMS: IndexingParams = {
  converter: {
    removeNumericTables: false,
    removeCodeSnippets: true,
  },
  preprocessor: {
    cleanWhitespace: true,
    cleanEmptyLines: true,
    cleanHeaderFooter: true,
    splitBy: "sentence",
    splitLength: 50,
    splitOverlap: 0,
    splitRespectSentenceBoundary: false,
  },
};

export const pipelineConfigSchema = z
  .object({
    converter: z
      .object({
        removeNumericTables: z.boolean(),
        removeCodeSnippets: z.boolean(),
      })
      .partial()
      .strict()
      .default({}),
    preprocessor: z
      .object({
        cleanWhitespace: z.boolean(),
        cleanEmptyLines: z.boolean(),
        cleanHeaderFooter: z.boolean(),
        splitBy: z.enum(["word", "sentence", "passage"]).nullable(),
        splitLength: z.number().int().positive(),
        splitOverlap: z.number().int().nonnegative(),
        splitRespectSentenceBoundary: z.boolean(),
      })
      .partial()
      .strict()
      .default({}),
  })
  .strict();

/**
 * Merge a parsed pipeline definition over {@link DEFAULT_INDEXING_PARAMS}.
 */
export function resolveIndexingParams(definition: unknown): IndexingParams {
  const parsed = pipelineConfigSchema.parse(definition);
  const params: IndexingParams = {
    converter: { ...DEFAULT_INDEXING_PARAMS.converter, ...parsed.converter },
    preprocessor: { ...DEFAULT_INDEXING_PARAMS.preprocessor, ...parsed.preprocessor },
  };

  const { splitLength, splitOverlap } = params.preprocessor;
  if (splitOverlap >= splitLength) {
    const message = `splitOverlap (${String(splitOverlap)}) must be smaller than splitLength (${String(splitLength)})`;
    throw new ValidationError(message, { splitOverlap: message });
  }

  return params;
}

/**
 * Load the pipeline definition file. Without a path the built-in defaults apply.
 */
export function loadPipelineConfig(path?: string): IndexingParams {
  if (!path) {
    return resolveIndexingParams({});
  }

  const raw = readFileSync(path, "utf8");
  return resolveIndexingParams(JSON.parse(raw));
}
