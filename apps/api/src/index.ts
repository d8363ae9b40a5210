import dotenv from "dotenv";
import path from "path";
import type { FastifyInstance } from "fastify";
import { shutdownTracing, startTracing } from "./observability/tracing";
import { parsePositiveIntEnv } from "./runtime-safety";

// Containers inject the environment directly; .env covers local runs.
dotenv.config({ path: path.resolve(__dirname, "..", "..", "..", ".env") });

async function releaseResources(app: FastifyInstance): Promise<void> {
  await app.close();
  const { getRegistryStore } = await import("./store");
  await getRegistryStore().close();
  await shutdownTracing();
}

async function main(): Promise<void> {
  // Instrumentation has to patch pg and fastify before the app loads them.
  startTracing();
  const { buildApp } = await import("./app");
  const app = await buildApp(true);
  const port = parsePositiveIntEnv(process.env.PORT || process.env.API_PORT, 3001);
  const host = process.env.API_HOST || "0.0.0.0";
  const shutdownTimeoutMs = parsePositiveIntEnv(process.env.SHUTDOWN_TIMEOUT_MS, 15_000);
  let stopping = false;

  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;
    app.log.info({ signal, shutdownTimeoutMs }, "Stopping civic registry API");

    const forceExit = setTimeout(() => {
      app.log.error("Shutdown timed out; exiting without draining the registry store");
      process.exit(1);
    }, shutdownTimeoutMs);
    forceExit.unref();

    try {
      await releaseResources(app);
      clearTimeout(forceExit);
      app.log.info("Civic registry API stopped");
      process.exit(0);
    } catch (err) {
      clearTimeout(forceExit);
      app.log.error(err, "Error while stopping civic registry API");
      process.exit(1);
    }
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => void stop(signal));
  }

  try {
    await app.listen({ port, host });
    app.log.info({ host, port }, "Civic registry API listening");
  } catch (err) {
    app.log.error(err, "Civic registry API failed to listen");
    await releaseResources(app).catch((closeError: unknown) => {
      app.log.error(closeError, "Error while releasing resources after a failed start");
    });
    process.exit(1);
  }
}

void main();
