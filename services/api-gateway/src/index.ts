import "dotenv/config";
import { createLogger, loadConfig } from "@image-triage/shared";
import { createWorkItemStore } from "@image-triage/store";
import { startWorkerPool, type WorkerPool } from "@image-triage/classification-worker";
import { buildServer } from "./server.js";

const config = loadConfig();
const logger = createLogger("api-gateway", config.logLevel);

const main = async () => {
  const store = await createWorkItemStore(config.store);
  const app = buildServer({
    store,
    statusPollIntervalMs: config.statusPollIntervalMs,
    logLevel: config.logLevel,
  });

  let pool: WorkerPool | undefined;
  if (config.embedWorker) {
    pool = await startWorkerPool({ config, store, logger: logger.child({ component: "worker" }) });
  } else if (config.store.driver === "memory") {
    logger.warn("memory store without EMBED_WORKER: submitted items will stay pending");
  }

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, "shutting down");
    await app.close();
    await pool?.stop();
    await store.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }

  await app.listen({ host: config.host, port: config.port });
  logger.info({ host: config.host, port: config.port, store: config.store.driver }, "api-gateway listening");
};

main().catch((err: unknown) => {
  logger.fatal({ err }, "api-gateway failed to start");
  process.exit(1);
});
