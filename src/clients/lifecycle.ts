import type { FastifyInstance } from "fastify";
import { logError, logInfo, logWarn, serializeError } from "../observability/logger.js";
import type { HealthReport } from "./retry.js";

let processHooksRegistered = false;

type HealthCheckedClient = { healthCheck: () => Promise<HealthReport> };

export interface ClientLifecycleModules {
  getOpenAIClient: () => Promise<HealthCheckedClient>;
  shutdownOpenAIClient: () => Promise<void>;
  getPostgresClient: () => Promise<HealthCheckedClient>;
  shutdownPostgresClient: () => Promise<void>;
  getQdrantClient: () => Promise<HealthCheckedClient>;
  shutdownQdrantClient: () => Promise<void>;
  getRedisClient: () => Promise<HealthCheckedClient | null>;
  shutdownRedisClient: () => Promise<void>;
}

async function getClientModules(): Promise<ClientLifecycleModules> {
  const [openaiModule, postgresModule, qdrantModule, redisModule] = await Promise.all([
    import("./openai.js"),
    import("./postgres.js"),
    import("./qdrant.js"),
    import("./redis.js")
  ]);

  return {
    getOpenAIClient: openaiModule.getOpenAIClient,
    shutdownOpenAIClient: openaiModule.shutdownOpenAIClient,
    getPostgresClient: postgresModule.getPostgresClient,
    shutdownPostgresClient: postgresModule.shutdownPostgresClient,
    getQdrantClient: qdrantModule.getQdrantClient,
    shutdownQdrantClient: qdrantModule.shutdownQdrantClient,
    getRedisClient: redisModule.getRedisClient,
    shutdownRedisClient: redisModule.shutdownRedisClient
  };
}

async function shutdownAllClients(source: string, loadClientModules: () => Promise<ClientLifecycleModules>): Promise<void> {
  const clients = await loadClientModules();
  logInfo("lifecycle.shutdown", {}, { source });
  const results = await Promise.allSettled([
    clients.shutdownQdrantClient(),
    clients.shutdownOpenAIClient(),
    clients.shutdownPostgresClient(),
    clients.shutdownRedisClient()
  ]);
  for (const result of results) {
    if (result.status === "rejected") {
      logWarn("lifecycle.shutdown_failed", {}, { source, ...serializeError(result.reason) });
    }
  }
}

export interface ClientLifecycleOptions {
  enableBootstrap: boolean;
  loadClientModules?: () => Promise<ClientLifecycleModules>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => never | void;
}

export function registerClientLifecycle(app: FastifyInstance, options: ClientLifecycleOptions): void {
  if (!options.enableBootstrap) {
    app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
    return;
  }
  const loadClientModules = options.loadClientModules ?? getClientModules;
  const shouldRegisterProcessSignals = options.registerProcessSignals ?? true;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const clients = await loadClientModules();
    await Promise.all([
      clients.getPostgresClient().then((client) => client.healthCheck()),
      clients.getOpenAIClient().then((client) => client.healthCheck()),
      clients.getQdrantClient().then((client) => client.healthCheck()),
      clients.getRedisClient().then((client) => client?.healthCheck())
    ]);
    app.log.info("Infrastructure singletons initialized and health checked");
  });

  app.addHook("onClose", async () => {
    await shutdownAllClients("onClose", loadClientModules);
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
      logInfo("lifecycle.signal", {}, { signal });
      await shutdownAllClients("process", loadClientModules);
      exit(0);
    };

    const onSignal = (signal: NodeJS.Signals): void => {
      handleSignal(signal).catch((error: unknown) => {
        logError("lifecycle.signal_failed", {}, { signal, ...serializeError(error) });
        exit(1);
      });
    };

    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
