import { z } from "zod";
import type { LogLevel } from "./logger.js";

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

// setTimeout clamps anything above this to 1ms
const MAX_TIMER_MS = 2_147_483_647;

const millis = (fallback: number) => z.coerce.number().int().positive().max(MAX_TIMER_MS).default(fallback);

const envSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
    HOST: z.string().trim().min(1).default("0.0.0.0"),
    PORT: z.coerce.number().int().positive().max(65535).default(8080),
    STORE_DRIVER: z.enum(["memory", "postgres"]).default("memory"),
    DATABASE_URL: z.string().min(1).optional(),
    REDIS_HOST: z.string().min(1).optional(),
    REDIS_PORT: z.coerce.number().int().positive().default(6379),
    WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
    WORKER_BATCH_SIZE: z.coerce.number().int().min(1).max(500).default(10),
    WORKER_POLL_INTERVAL_MS: millis(5_000),
    WORKER_MAX_IDLE_INTERVAL_MS: millis(30_000),
    RECLAIM_AFTER_MS: millis(5 * 60_000),
    RECLAIM_SWEEP_INTERVAL_MS: millis(60_000),
    PAYLOAD_ROOT: z.string().min(1).default("./uploads"),
    PAYLOAD_TIMEOUT_MS: millis(10_000),
    CLASSIFY_TIMEOUT_MS: millis(30_000),
    MAX_CLAIM_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    CLASSIFIER: z.enum(["mock", "http"]).default("mock"),
    CLASSIFIER_URL: z.string().url().optional(),
    STATUS_POLL_INTERVAL_MS: millis(2_000),
    EMBED_WORKER: flag,
  })
  .superRefine((env, ctx) => {
    if (env.STORE_DRIVER === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["DATABASE_URL"], message: "required when STORE_DRIVER=postgres" });
    }
    if (env.CLASSIFIER === "http" && !env.CLASSIFIER_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["CLASSIFIER_URL"], message: "required when CLASSIFIER=http" });
    }
    if (env.WORKER_MAX_IDLE_INTERVAL_MS < env.WORKER_POLL_INTERVAL_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["WORKER_MAX_IDLE_INTERVAL_MS"],
        message: "must be at least WORKER_POLL_INTERVAL_MS",
      });
    }
    if (env.RECLAIM_AFTER_MS <= env.PAYLOAD_TIMEOUT_MS + env.CLASSIFY_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RECLAIM_AFTER_MS"],
        message: "must exceed PAYLOAD_TIMEOUT_MS + CLASSIFY_TIMEOUT_MS",
      });
    }
  });

export type StoreConfig =
  | { driver: "memory" }
  | { driver: "postgres"; databaseUrl: string };

export type ClassifierConfig =
  | { kind: "mock" }
  | { kind: "http"; url: string };

export type WorkerConfig = {
  concurrency: number;
  batchSize: number;
  pollIntervalMs: number;
  maxIdleIntervalMs: number;
  payloadTimeoutMs: number;
  classifyTimeoutMs: number;
  maxClaimAttempts: number;
  reclaimAfterMs: number;
  sweepIntervalMs: number;
};

export type AppConfig = {
  env: string;
  logLevel: LogLevel;
  host: string;
  port: number;
  store: StoreConfig;
  redis?: { host: string; port: number };
  payloadRoot: string;
  classifier: ClassifierConfig;
  worker: WorkerConfig;
  statusPollIntervalMs: number;
  embedWorker: boolean;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const env = parsed.data;

  const store: StoreConfig =
    env.STORE_DRIVER === "postgres" && env.DATABASE_URL
      ? { driver: "postgres", databaseUrl: env.DATABASE_URL }
      : { driver: "memory" };

  const classifier: ClassifierConfig =
    env.CLASSIFIER === "http" && env.CLASSIFIER_URL
      ? { kind: "http", url: env.CLASSIFIER_URL }
      : { kind: "mock" };

  return {
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : "info"),
    host: env.HOST,
    port: env.PORT,
    store,
    redis: env.REDIS_HOST ? { host: env.REDIS_HOST, port: env.REDIS_PORT } : undefined,
    payloadRoot: env.PAYLOAD_ROOT,
    classifier,
    worker: {
      concurrency: env.WORKER_CONCURRENCY,
      batchSize: env.WORKER_BATCH_SIZE,
      pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
      maxIdleIntervalMs: env.WORKER_MAX_IDLE_INTERVAL_MS,
      payloadTimeoutMs: env.PAYLOAD_TIMEOUT_MS,
      classifyTimeoutMs: env.CLASSIFY_TIMEOUT_MS,
      maxClaimAttempts: env.MAX_CLAIM_ATTEMPTS,
      reclaimAfterMs: env.RECLAIM_AFTER_MS,
      sweepIntervalMs: env.RECLAIM_SWEEP_INTERVAL_MS,
    },
    statusPollIntervalMs: env.STATUS_POLL_INTERVAL_MS,
    embedWorker: env.EMBED_WORKER,
  };
};
