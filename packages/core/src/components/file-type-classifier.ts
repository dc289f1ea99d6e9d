import { classifyFile } from "@indexflow/converters";
import type { Logger } from "@indexflow/logger";
import type {
  ComponentOutput,
  FileClassification,
  OutputEdge,
  PipelineComponent,
  PipelineState,
} from "@indexflow/types";

export type ClassifyFn = (path: string) => Promise<FileClassification>;

/** Channel a classification is routed to; unknown files are routed nowhere. */
export function edgeForClassification(classification: FileClassification): OutputEdge | null {
  switch (classification.kind) {
    case "text":
      return "output_1";
    case "pdf":
      return "output_2";
    case "markdown":
      return "output_3";
    case "docx":
      return "output_4";
    case "html":
      return "output_5";
    case "unknown":
      return null;
  }
}

export class FileTypeClassifierComponent implements PipelineComponent {
  readonly outgoingEdges = 5;

  constructor(
    private readonly logger: Logger,
    private readonly classify: ClassifyFn = classifyFile,
  ) {}

  async run(state: PipelineState): Promise<ComponentOutput | null> {
    const classification = await this.classify(state.file.path);
    const edge = edgeForClassification(classification);

    this.logger.debug(
      { file: state.file.meta["name"], kind: classification.kind, extension: classification.extension, edge },
      "File classified",
    );

    return edge ? { state, edge } : null;
  }
}
