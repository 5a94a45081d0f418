import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { registerClientLifecycle } from "./clients/lifecycle.js";
import { registerHealthRoute } from "./api/routes/health.js";
import { registerInfrastructureHealthRoute } from "./api/routes/infrastructure-health.js";
import { registerApiRoutes, type ApiRoutesDependencies } from "./api/routes/index.js";
import { config } from "./config/index.js";
import { registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";

export interface BuildAppOptions {
  apiDependencies?: ApiRoutesDependencies;
  registerInfrastructureHealth?: boolean;
  enableInfraBootstrap?: boolean;
  frontendOrigin?: string;
  logger?: boolean;
}

export function buildAllowedFrontendOrigins(rawOrigin: string | undefined): string[] {
  const configured = rawOrigin
    ?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  const origins = new Set<string>(
    configured && configured.length > 0 ? configured : ["http://localhost:5173", "http://127.0.0.1:5173"]
  );

  for (const origin of [...origins]) {
    if (!URL.canParse(origin)) {
      continue;
    }
    const url = new URL(origin);
    if (url.hostname === "localhost") {
      url.hostname = "127.0.0.1";
      origins.add(url.toString().replace(/\/$/, ""));
    } else if (url.hostname === "127.0.0.1") {
      url.hostname = "localhost";
      origins.add(url.toString().replace(/\/$/, ""));
    }
  }

  return [...origins];
}

export async function buildApp(options?: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options?.logger ?? true });

  await app.register(cors, {
    origin: buildAllowedFrontendOrigins(options?.frontendOrigin ?? config.FRONTEND_ORIGIN),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-Id"]
  });

  registerRequestMetricsHooks(app);
  registerClientLifecycle(app, { enableBootstrap: options?.enableInfraBootstrap ?? config.ENABLE_INFRA_BOOTSTRAP });
  await registerHealthRoute(app);
  await registerMetricsRoutes(app);
  if (options?.registerInfrastructureHealth !== false) {
    await registerInfrastructureHealthRoute(app);
  }
  await registerApiRoutes(app, options?.apiDependencies);

  return app;
}
