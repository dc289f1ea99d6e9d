import type { FileInput, IndexDocument } from "./document.js";

/** Name of the implicit root every graph starts from. */
export const ROOT_NODE = "File";

/** Numbered output channel of a node, starting at `output_1`. */
export type OutputEdge = `output_${number}`;

/**
 * Value carried between pipeline nodes for one file. Converters fill
 * `documents`; later stages replace it.
 */
export interface PipelineState {
  file: FileInput;
  documents: IndexDocument[];
}

export interface ComponentOutput {
  state: PipelineState;
  edge: OutputEdge;
}

export interface PipelineComponent {
  /** Number of numbered output channels the component can emit on. */
  readonly outgoingEdges: number;
  /** Returns null when the component routes the item nowhere. */
  run(state: PipelineState): Promise<ComponentOutput | null>;
}

export interface PipelineRunResult {
  /** Node names in the order they ran. */
  visited: string[];
  /** State produced by the terminal node, or null when the item was dropped. */
  output: PipelineState | null;
}

export type FileKind = "text" | "pdf" | "markdown" | "docx" | "html" | "unknown";

export type FileClassification =
  | { kind: "text"; extension: string }
  | { kind: "pdf"; extension: string }
  | { kind: "markdown"; extension: string }
  | { kind: "docx"; extension: string }
  | { kind: "html"; extension: string }
  | { kind: "unknown"; extension: string | null };

export interface ConverterParams {
  removeNumericTables: boolean;
  removeCodeSnippets: boolean;
}

export type SplitBy = "word" | "sentence" | "passage";

export interface PreprocessorParams {
  cleanWhitespace: boolean;
  cleanEmptyLines: boolean;
  cleanHeaderFooter: boolean;
  splitBy: SplitBy | null;
  splitLength: number;
  splitOverlap: number;
  splitRespectSentenceBoundary: boolean;
}

export interface IndexingParams {
  converter: ConverterParams;
  preprocessor: PreprocessorParams;
}

export interface IndexingRunSummary {
  collection: string;
  filesIndexed: number;
  filesDropped: number;
  documentsWritten: number;
}
