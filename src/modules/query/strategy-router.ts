import type { QueryAnalysis, QueryIntent, RetrievalStrategy } from "./types.js";

const STRATEGY_BY_INTENT: Readonly<Record<QueryIntent, RetrievalStrategy>> = {
  factoid: "simple_search",
  statistics: "statistics_query",
  prediction: "prediction_query",
  talk: "static_response",
  attacking: "reject",
  analytical: "hybrid_search",
  unknown: "hybrid_search"
};

const STRATEGY_DESCRIPTIONS: Readonly<Record<RetrievalStrategy, string>> = {
  simple_search: "vector similarity search over news",
  statistics_query: "generated SQL over news statistics",
  prediction_query: "static redirect for prediction questions",
  static_response: "static greeting and help text",
  reject: "security rejection without backend access",
  hybrid_search: "vector search for ambiguous questions"
};

const isKnownIntent = (value: string): value is QueryIntent => Object.hasOwn(STRATEGY_BY_INTENT, value);

export const routeStrategy = (analysis: Pick<QueryAnalysis, "intent">): RetrievalStrategy => {
  // Intents arrive from model output; anything unrecognized goes to the broadest strategy.
  const intent: string = analysis.intent;
  return isKnownIntent(intent) ? STRATEGY_BY_INTENT[intent] : "hybrid_search";
};

export const describeStrategy = (strategy: RetrievalStrategy): string => STRATEGY_DESCRIPTIONS[strategy];
