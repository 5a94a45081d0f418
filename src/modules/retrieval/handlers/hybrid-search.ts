import { truncateForLog } from "../../../observability/logger.js";
import type { RetrieveInput } from "../types.js";
import { VectorSearchHandler } from "./vector-search.js";

/** Fallback for analytical and unclassified questions; searches the same way as simple search. */
export class HybridSearchHandler extends VectorSearchHandler {
  readonly name = "HybridSearchHandler";

  protected override beforeSearch(input: RetrieveInput): void {
    this.logger.logWarn("retrieval.ambiguous_routing", { requestId: input.requestId }, {
      handler: this.name,
      query: truncateForLog(input.query)
    });
  }
}
