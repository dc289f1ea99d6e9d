import type { IDocumentStore, WriteResult } from "@indexflow/document-store";
import { MissingCollectionError } from "@indexflow/errors";
import type { Logger } from "@indexflow/logger";
import type {
  ComponentOutput,
  DuplicateDocumentsPolicy,
  PipelineComponent,
  PipelineState,
} from "@indexflow/types";

/** Terminal node: writes passages into the collection named by `meta.index`. */
export class DocumentStoreWriterComponent implements PipelineComponent {
  readonly outgoingEdges = 1;
  private totals: WriteResult = { written: 0, skipped: 0 };

  constructor(
    private readonly store: IDocumentStore,
    private readonly policy: DuplicateDocumentsPolicy,
    private readonly logger: Logger,
  ) {}

  /** Documents written and skipped since the component was created. */
  get stats(): WriteResult {
    return { ...this.totals };
  }

  async run(state: PipelineState): Promise<ComponentOutput> {
    const collection = state.file.meta["index"];
    if (typeof collection !== "string" || collection.length === 0) {
      throw new MissingCollectionError();
    }

    const result = await this.store.writeDocuments(collection, state.documents, this.policy);
    this.totals.written += result.written;
    this.totals.skipped += result.skipped;

    this.logger.info(
      { file: state.file.meta["name"], collection, written: result.written, skipped: result.skipped },
      "Documents written",
    );

    return { state, edge: "output_1" };
  }
}
