import { describe, expect, it } from "vitest";
import { createAnswerGenerator, resolveSources } from "../../src/modules/answer/answer-generator.js";
import type { SearchResult } from "../../src/modules/retrieval/types.js";
import { localizedMessage } from "../../src/prompts/messages.js";
import { ScriptedCompletion, createLoggerSpy } from "../helpers/fakes.js";

const options = { model: "answer-model", temperature: 0.3, timeoutMs: 1000 };

const documents: SearchResult[] = [
  {
    doc_id: "n1",
    content: "Bakıda beynəlxalq festival keçirildi.",
    score: 0.5,
    kind: "document",
    metadata: { source: "Report.az", url: "https://report.az/1", category: "mədəniyyət", date: "2025-05-01" }
  },
  {
    doc_id: "n2",
    content: "Festivalda 20 ölkə iştirak etdi.",
    score: 0.25,
    kind: "document",
    metadata: {}
  }
];

describe("modules/answer/answer-generator", () => {
  it("returns the no-information answer without calling the model", async () => {
    const completion = new ScriptedCompletion();
    const generator = createAnswerGenerator(options, { completion });

    const answer = await generator.generate({ query: "test", searchResults: [], language: "ru" });

    expect(answer).toEqual({
      answer: localizedMessage("no_information", "ru"),
      sources: [],
      confidence: "low",
      key_facts: []
    });
    expect(completion.requests).toHaveLength(0);
  });

  it("passes static content through with high confidence", async () => {
    const completion = new ScriptedCompletion();
    const generator = createAnswerGenerator(options, { completion });
    const talk: SearchResult = {
      doc_id: "talk_response",
      content: "Salam!",
      score: 1,
      kind: "static",
      metadata: { type: "talk" }
    };

    const answer = await generator.generate({ query: "Salam", searchResults: [talk], language: "az" });

    expect(answer).toEqual({ answer: "Salam!", sources: [], confidence: "high", key_facts: [] });
    expect(completion.requests).toHaveLength(0);
  });

  it("passes handler errors through with low confidence", async () => {
    const generator = createAnswerGenerator(options, { completion: new ScriptedCompletion() });
    const error: SearchResult = { doc_id: "error", content: "failed", score: 0, kind: "error", metadata: {} };

    const answer = await generator.generate({ query: "q", searchResults: [error], language: "en" });

    expect(answer.confidence).toBe("low");
    expect(answer.answer).toBe("failed");
  });

  it("grounds the answer on evidence and resolves cited sources", async () => {
    const completion = new ScriptedCompletion([
      JSON.stringify({
        answer: "Bakıda festival keçirildi və 20 ölkə iştirak etdi.",
        sources: [
          { id: "n1", name: "Some name", url: "https://wrong.example/1" },
          { id: "n1", name: "Duplicate" },
          { id: "n2", name: "Xəbər agentliyi", url: "https://agency.example/2" },
          { id: "ghost", name: "Ghost" }
        ],
        confidence: "HIGH",
        key_facts: ["20 ölkə", ""]
      })
    ]);
    const generator = createAnswerGenerator(options, { completion, ...createLoggerSpy() });

    const answer = await generator.generate({
      query: "Bakıda hansı festival olub?",
      searchResults: documents,
      language: "az",
      requestId: "req-1"
    });

    expect(answer).toEqual({
      answer: "Bakıda festival keçirildi və 20 ölkə iştirak etdi.",
      sources: [
        { id: "n1", name: "Report.az", url: "https://report.az/1" },
        { id: "n2", name: "Xəbər agentliyi", url: "https://agency.example/2" },
        { id: "ghost", name: "Ghost", url: null }
      ],
      confidence: "high",
      key_facts: ["20 ölkə"]
    });

    const [request] = completion.requests;
    expect(request).toMatchObject({ model: "answer-model", temperature: 0.3, responseFormat: "json_object" });
    const userPrompt = request?.messages[1]?.content ?? "";
    expect(userPrompt).toContain(
      [
        "[NEWS #1]",
        "ID: n1",
        "Source: Report.az",
        "URL: https://report.az/1",
        "Category: mədəniyyət",
        "Importance: N/A",
        "Date: 2025-05-01",
        "Relevance: 0.500",
        "",
        "CONTENT:",
        "Bakıda beynəlxalq festival keçirildi."
      ].join("\n")
    );
  });

  it("leaves non-evidence results out of the model context", async () => {
    const completion = new ScriptedCompletion([JSON.stringify({ answer: "ok", confidence: "medium" })]);
    const generator = createAnswerGenerator(options, { completion, ...createLoggerSpy() });
    const noise: SearchResult = { doc_id: "error", content: "handler failed", score: 0, kind: "error", metadata: {} };

    await generator.generate({ query: "q", searchResults: [noise, documents[1] ?? noise], language: "en" });

    const userPrompt = completion.requests[0]?.messages[1]?.content ?? "";
    expect(userPrompt).toContain("ID: n2");
    expect(userPrompt).not.toContain("handler failed");
  });

  it("returns the localized failure answer when the model output is unusable", async () => {
    const completion = new ScriptedCompletion([JSON.stringify({ answer: "   ", confidence: "high" })]);
    const logger = createLoggerSpy();
    const generator = createAnswerGenerator(options, { completion, ...logger });

    const answer = await generator.generate({ query: "q", searchResults: documents, language: "en" });

    expect(answer).toEqual({
      answer: "The answer could not be generated. Please ask again.",
      sources: [],
      confidence: "low",
      key_facts: []
    });
    expect(logger.logWarn).toHaveBeenCalledWith(
      "answer.generation_failed",
      { requestId: undefined },
      expect.objectContaining({ error_name: "UpstreamMalformedResponseError" })
    );
  });

  it("defaults unrecognized confidence to medium", async () => {
    const completion = new ScriptedCompletion([JSON.stringify({ answer: "ok", confidence: "certain" })]);
    const generator = createAnswerGenerator(options, { completion, ...createLoggerSpy() });

    const answer = await generator.generate({ query: "q", searchResults: documents, language: "en" });

    expect(answer.confidence).toBe("medium");
  });

  it("falls back to the cited name for results without a source", () => {
    expect(resolveSources([{ id: "n2" }, { id: 7, name: "Numeric" }, "garbage"], documents)).toEqual([
      { id: "n2", name: "n2", url: null },
      { id: "7", name: "Numeric", url: null }
    ]);
  });
});
