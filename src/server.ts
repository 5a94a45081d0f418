import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { config } from "./config/index.js";
import { logError, serializeError } from "./observability/logger.js";

export async function bootstrap(): Promise<void> {
  const app = await buildApp();
  await app.listen({
    host: "0.0.0.0",
    port: config.PORT
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    logError("server.startup_failed", {}, serializeError(error));
    process.exitCode = 1;
  });
}
