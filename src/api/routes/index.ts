import type { FastifyInstance } from "fastify";
import { registerChatRoutes, type ChatRoutesDependencies } from "./chat.js";

export interface ApiRoutesDependencies {
  chat?: ChatRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerChatRoutes(app, dependencies?.chat);
}
