import { VectorSearchHandler } from "./vector-search.js";

export class SimpleSearchHandler extends VectorSearchHandler {
  readonly name = "SimpleSearchHandler";
}
