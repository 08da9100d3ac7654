import Fastify from "fastify";
import sensible from "@fastify/sensible";
import type { LogLevel } from "@image-triage/shared";
import { MemoryWorkItemStore, type WorkItemStore } from "@image-triage/store";
import { StatusQueryService } from "./domain/status-query.js";
import { registerErrorHandling } from "./errors.js";
import { registerV1Routes } from "./routes/v1.js";

export type ServerOptions = {
  store?: WorkItemStore;
  statusPollIntervalMs?: number;
  logLevel?: LogLevel;
  clock?: () => Date;
};

export const buildServer = (options: ServerOptions = {}) => {
  const level = options.logLevel;
  const app = Fastify({ logger: level && level !== "silent" ? { level, name: "api-gateway" } : false });
  const store = options.store ?? new MemoryWorkItemStore();

  app.register(sensible);
  registerErrorHandling(app);

  app.get("/healthz", async () => ({ ok: true }));
  registerV1Routes(app, {
    store,
    statusQuery: new StatusQueryService(store),
    statusPollIntervalMs: options.statusPollIntervalMs ?? 2_000,
    clock: options.clock ?? (() => new Date()),
  });

  return app;
};
