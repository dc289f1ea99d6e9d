import { z } from "zod";
import { ValidationError } from "@indexflow/errors";
import type { IndexingParams } from "@indexflow/types";

const formBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no", "on", "off"]))
  .transform((val) => val === "true" || val === "1" || val === "yes" || val === "on");

const formInteger = (min: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, "Expected an integer")
    .transform(Number)
    .pipe(z.number().int().min(min));

/** Empty form fields count as absent. */
const optionalField = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((val) => (val === "" ? undefined : val), schema.optional());

/**
 * Text fields of the upload form. Every override is optional; absent fields
 * keep the pipeline default.
 */
export const uploadFormSchema = z.object({
  meta: z.string().optional(),
  remove_numeric_tables: optionalField(formBoolean),
  clean_whitespace: optionalField(formBoolean),
  clean_empty_lines: optionalField(formBoolean),
  clean_header_footer: optionalField(formBoolean),
  split_by: optionalField(z.enum(["word", "sentence", "passage"])),
  split_length: optionalField(formInteger(1)),
  split_overlap: optionalField(formInteger(0)),
  split_respect_sentence_boundary: optionalField(formBoolean),
});

export type UploadForm = z.infer<typeof uploadFormSchema>;

function fieldErrors(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.join(".") || "form";
    fields[key] ??= issue.message;
  }
  return fields;
}

export function parseUploadForm(body: unknown): UploadForm {
  const parsed = uploadFormSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError("Invalid upload parameters", fieldErrors(parsed.error));
  }
  return parsed.data;
}

/** Apply the request's overrides on top of the pipeline defaults. */
export function applyOverrides(defaults: IndexingParams, form: UploadForm): IndexingParams {
  const params: IndexingParams = {
    converter: {
      ...defaults.converter,
      removeNumericTables: form.remove_numeric_tables ?? defaults.converter.removeNumericTables,
    },
    preprocessor: {
      cleanWhitespace: form.clean_whitespace ?? defaults.preprocessor.cleanWhitespace,
      cleanEmptyLines: form.clean_empty_lines ?? defaults.preprocessor.cleanEmptyLines,
      cleanHeaderFooter: form.clean_header_footer ?? defaults.preprocessor.cleanHeaderFooter,
      splitBy: form.split_by ?? defaults.preprocessor.splitBy,
      splitLength: form.split_length ?? defaults.preprocessor.splitLength,
      splitOverlap: form.split_overlap ?? defaults.preprocessor.splitOverlap,
      splitRespectSentenceBoundary:
        form.split_respect_sentence_boundary ?? defaults.preprocessor.splitRespectSentenceBoundary,
    },
  };

  const { splitLength, splitOverlap } = params.preprocessor;
  if (splitOverlap >= splitLength) {
    throw new ValidationError("Invalid upload parameters", {
      split_overlap: `Must be smaller than split_length (${String(splitLength)})`,
    });
  }
  return params;
}
