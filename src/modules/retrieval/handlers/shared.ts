import { logError, logInfo, logWarn } from "../../../observability/logger.js";
import { localizedMessage } from "../../../prompts/messages.js";
import type { HandlerLogger, HandlerName, SearchResult } from "../types.js";

export const resolveHandlerLogger = (logger?: Partial<HandlerLogger>): HandlerLogger => ({
  logInfo: logger?.logInfo ?? logInfo,
  logWarn: logger?.logWarn ?? logWarn,
  logError: logger?.logError ?? logError
});

export const buildErrorResult = (handler: HandlerName, language: string, error: unknown): SearchResult => ({
  doc_id: "error",
  content: localizedMessage("error", language),
  score: 0,
  kind: "error",
  metadata: {
    handler,
    error_type: error instanceof Error ? error.name : "UnknownError"
  }
});
