import { BackendUnavailableError, errorMessage } from "../../errors.js";
import type { SearchResultMetadata, VectorFilters, VectorHit, VectorSearchService } from "../retrieval/types.js";
import type { Embedder } from "./openai-completion.js";

export interface QdrantFieldCondition {
  key: string;
  match: { value: string | number | boolean };
}

export interface QdrantSearchRequest {
  vector: number[];
  limit: number;
  with_payload: boolean;
  filter?: { must: QdrantFieldCondition[] };
}

export interface QdrantScoredPoint {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

/** The part of the Qdrant REST client this adapter calls. */
export interface QdrantSearchClient {
  search(collection: string, request: QdrantSearchRequest): Promise<QdrantScoredPoint[]>;
}

const CONTENT_KEYS = ["full_content", "content", "text"] as const;
const DOC_ID_KEYS = ["doc_id", "news_id", "id"] as const;

const pickFirstString = (source: Record<string, unknown>, keys: readonly string[]): string | undefined => {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
};

export const buildQdrantFilter = (filters: VectorFilters | null): QdrantSearchRequest["filter"] => {
  if (!filters) {
    return undefined;
  }
  const must = Object.entries(filters).map(([key, value]) => ({ key, match: { value } }));
  return must.length > 0 ? { must } : undefined;
};

export const toVectorHit = (point: QdrantScoredPoint): VectorHit => {
  const payload = point.payload ?? {};
  const metadata: SearchResultMetadata = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!CONTENT_KEYS.some((contentKey) => contentKey === key)) {
      metadata[key] = value;
    }
  }
  return {
    id: pickFirstString(payload, DOC_ID_KEYS) ?? String(point.id),
    content: pickFirstString(payload, CONTENT_KEYS) ?? "",
    score: point.score,
    metadata
  };
};

export class QdrantVectorSearch implements VectorSearchService {
  constructor(
    private readonly client: QdrantSearchClient,
    private readonly embed: Embedder,
    private readonly collection: string
  ) {}

  async search(query: string, topK: number, filters: VectorFilters | null, signal?: AbortSignal): Promise<VectorHit[]> {
    const vector = await this.embed(query, signal);
    const filter = buildQdrantFilter(filters);

    let points: QdrantScoredPoint[];
    try {
      points = await this.client.search(this.collection, {
        vector,
        limit: topK,
        with_payload: true,
        ...(filter ? { filter } : {})
      });
    } catch (error) {
      throw new BackendUnavailableError(`Qdrant search failed: ${errorMessage(error)}`, { cause: error });
    }

    return points.map(toVectorHit).filter((hit) => hit.content.trim().length > 0);
  }
}
