import "dotenv/config";
import { createLogger, loadConfig } from "@image-triage/shared";
import { createWorkItemStore } from "@image-triage/store";
import { startWorkerPool } from "./pool.js";

const config = loadConfig();
const logger = createLogger("classification-worker", config.logLevel);

const main = async () => {
  const store = await createWorkItemStore(config.store);
  const pool = await startWorkerPool({ config, store, logger });

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, "shutting down");
    await pool.stop();
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

  logger.info({ store: config.store.driver, payloadRoot: config.payloadRoot }, "classification-worker running");
};

main().catch((err: unknown) => {
  logger.fatal({ err }, "classification-worker failed to start");
  process.exit(1);
});
