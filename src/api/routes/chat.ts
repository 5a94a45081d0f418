import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { InputError } from "../../errors.js";
import { toQAResponsePayload, type QaService } from "../../modules/qa/qa-service.js";
import { logError, logWarn, serializeError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";

const MAX_BATCH_SIZE = 20;
const MAX_REQUEST_TOP_K = 20;

const topKSchema = z.number().int().min(1).max(MAX_REQUEST_TOP_K).optional();

const askBodySchema = z.object({
  query: z.string().min(1, "query must not be empty"),
  top_k: topKSchema
});

const batchBodySchema = z.object({
  queries: z.array(z.string()).min(1, "queries must not be empty").max(MAX_BATCH_SIZE),
  top_k: topKSchema
});

export type QaAnswering = Pick<QaService, "answer" | "answerBatch">;

export interface ChatRoutesDependencies {
  getQaService?: () => Promise<QaAnswering>;
}

const toValidationError = (error: z.ZodError) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

/** Aborts when the client disconnects before the response is written. */
const abortOnDisconnect = (reply: FastifyReply): AbortController => {
  const controller = new AbortController();
  reply.raw.on("close", () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller;
};

const loadQaService = async (): Promise<QaAnswering> => {
  const { getQaService } = await import("../../modules/qa/container.js");
  return getQaService();
};

export async function registerChatRoutes(app: FastifyInstance, dependencies?: ChatRoutesDependencies): Promise<void> {
  const getQaService = dependencies?.getQaService ?? loadQaService;

  app.post("/chat/ask", async (request, reply) => {
    const parsed = askBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422);
      return toValidationError(parsed.error);
    }

    const requestId = resolveRequestId(request);
    const controller = abortOnDisconnect(reply);
    try {
      const qaService = await getQaService();
      const response = await qaService.answer(parsed.data.query, {
        topK: parsed.data.top_k,
        signal: controller.signal,
        requestId
      });
      return toQAResponsePayload(response);
    } catch (error) {
      if (error instanceof InputError) {
        logWarn("chat.ask.invalid_query", { requestId }, serializeError(error));
        recordErrorRate("input_400");
        reply.code(400);
        return { detail: error.message };
      }
      logError("chat.ask.failed", { requestId }, serializeError(error));
      reply.code(500);
      return { detail: "Internal server error" };
    }
  });

  app.post("/chat/ask/batch", async (request, reply) => {
    const parsed = batchBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422);
      return toValidationError(parsed.error);
    }

    const batchId = resolveRequestId(request);
    const controller = abortOnDisconnect(reply);
    try {
      const qaService = await getQaService();
      const responses = await qaService.answerBatch(parsed.data.queries, {
        topK: parsed.data.top_k,
        signal: controller.signal,
        batchId
      });
      return { results: responses.map(toQAResponsePayload) };
    } catch (error) {
      logError("chat.batch.failed", { batchId }, serializeError(error));
      reply.code(500);
      return { detail: "Internal server error" };
    }
  });
}
