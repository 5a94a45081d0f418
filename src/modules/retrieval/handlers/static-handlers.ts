import { truncateForLog } from "../../../observability/logger.js";
import { localizedMessage } from "../../../prompts/messages.js";
import type { HandlerLogger, RetrievalHandler, RetrieveInput, SearchResult } from "../types.js";
import { resolveHandlerLogger } from "./shared.js";

export class TalkHandler implements RetrievalHandler {
  readonly name = "TalkHandler";

  async retrieve(input: RetrieveInput): Promise<SearchResult[]> {
    return [
      {
        doc_id: "talk_response",
        content: localizedMessage("talk", input.language),
        score: 1,
        kind: "static",
        metadata: { type: "talk" }
      }
    ];
  }
}

export class PredictionHandler implements RetrievalHandler {
  readonly name = "PredictionHandler";

  async retrieve(input: RetrieveInput): Promise<SearchResult[]> {
    return [
      {
        doc_id: "prediction_response",
        content: localizedMessage("prediction", input.language),
        score: 1,
        kind: "static",
        metadata: { type: "prediction" }
      }
    ];
  }
}

/**
 * Rejects queries classified as attacks. Never touches a backend; every rejection is
 * written to the audit log.
 */
export class AttackingHandler implements RetrievalHandler {
  readonly name = "AttackingHandler";

  private readonly logger: HandlerLogger;

  constructor(dependencies: { logger?: Partial<HandlerLogger> } = {}) {
    this.logger = resolveHandlerLogger(dependencies.logger);
  }

  async retrieve(input: RetrieveInput): Promise<SearchResult[]> {
    this.logger.logWarn("security.query_rejected", { requestId: input.requestId }, {
      handler: this.name,
      query: truncateForLog(input.query)
    });

    return [
      {
        doc_id: "security_warning",
        content: localizedMessage("attacking", input.language),
        score: 1,
        kind: "rejected",
        metadata: { type: "security" }
      }
    ];
  }
}
