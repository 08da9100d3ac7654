import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger, loadConfig } from "@image-triage/shared";
import type { ClassificationResult } from "@image-triage/shared";
import { MemoryWorkItemStore } from "@image-triage/store";
import { startWorkerPool, type ClassificationAdapter, type PayloadSource } from "@image-triage/classification-worker";
import { buildServer } from "./server.js";

const NOW = new Date("2026-03-01T09:00:00.000Z");

const catResult: ClassificationResult = {
  label: "Cat",
  confidence: 0.95,
  scoreDistribution: { Cat: 0.95, Dog: 0.05 },
};

describe("api-gateway", () => {
  let store: MemoryWorkItemStore;
  let app: ReturnType<typeof buildServer>;

  beforeEach(() => {
    store = new MemoryWorkItemStore();
    app = buildServer({ store, statusPollIntervalMs: 1500, clock: () => NOW });
  });

  afterEach(async () => {
    await app.close();
  });

  const submit = (payload: Record<string, unknown>) => app.inject({ method: "POST", url: "/v1/items", payload });

  it("answers health checks", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
  });

  it("creates pending work items", async () => {
    const res = await submit({ id: "img1", owner_ref: "owner-1", payload_ref: "uploads/img1.png" });
    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({ id: "img1", state: "pending", created_at: "2026-03-01T09:00:00.000Z" });
    expect(await store.get("img1")).toMatchObject({ ownerRef: "owner-1", payloadRef: "uploads/img1.png" });
  });

  it("generates an id when none is given", async () => {
    const res = await submit({ owner_ref: "owner-1", payload_ref: "a.png" });
    expect(res.statusCode).toBe(201);
    const { id } = res.json();
    expect(id).toMatch(/^[0-9a-f-]{36}$/);
    expect((await store.get(id)).state).toBe("pending");
  });

  it("rejects duplicate ids", async () => {
    await submit({ id: "img1", owner_ref: "owner-1", payload_ref: "a.png" });
    const res = await submit({ id: "img1", owner_ref: "owner-2", payload_ref: "b.png" });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: { code: "DUPLICATE_ID", message: "work item img1 already exists" } });
  });

  it("validates submissions", async () => {
    const res = await submit({ payload_ref: "a.png" });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "request validation failed",
        details: { issues: [{ path: "owner_ref", message: "Required" }] },
      },
    });
  });

  it("tells clients of unfinished items when to poll again", async () => {
    await submit({ id: "img1", owner_ref: "owner-1", payload_ref: "a.png" });
    const res = await app.inject({ method: "GET", url: "/v1/items/img1/status" });
    expect(res.statusCode).toBe(200);
    expect(res.headers["retry-after"]).toBe("2");
    expect(res.json()).toEqual({ id: "img1", state: "pending", poll_after_ms: 1500 });

    await store.tryClaim("img1", "w1:token", NOW);
    const processing = await app.inject({ method: "GET", url: "/v1/items/img1/status" });
    expect(processing.json()).toEqual({ id: "img1", state: "processing", poll_after_ms: 1500 });
  });

  it("returns the classification of finished items", async () => {
    await submit({ id: "img1", owner_ref: "owner-1", payload_ref: "a.png" });
    await store.tryClaim("img1", "w1", NOW);
    await store.commitResult("img1", "w1", { ...catResult, modelVersion: "mock-animal-v1", processingTimeMs: 12 }, NOW);

    const res = await app.inject({ method: "GET", url: "/v1/items/img1/status" });
    expect(res.statusCode).toBe(200);
    expect(res.headers["retry-after"]).toBeUndefined();
    expect(res.json()).toEqual({
      id: "img1",
      state: "done",
      result: {
        label: "Cat",
        confidence: 0.95,
        score_distribution: { Cat: 0.95, Dog: 0.05 },
        model_version: "mock-animal-v1",
        processing_time_ms: 12,
      },
    });
  });

  it("returns the failure reason of failed items", async () => {
    await submit({ id: "img4", owner_ref: "owner-1", payload_ref: "a.png" });
    await store.tryClaim("img4", "w1", NOW);
    await store.commitFailure("img4", "w1", { kind: "AdapterError", detail: "corrupt image" }, NOW);

    const res = await app.inject({ method: "GET", url: "/v1/items/img4/status" });
    expect(res.json()).toEqual({
      id: "img4",
      state: "failed",
      failure_reason: "corrupt image",
      failure_kind: "AdapterError",
    });
  });

  it("returns 404 for unknown items", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/items/nope/status" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: { code: "NOT_FOUND", message: "work item nope not found" } });
  });

  it("lists an owner's items newest first", async () => {
    await store.create({ id: "old", ownerRef: "owner-a", payloadRef: "old.png" }, new Date(1000));
    await store.create({ id: "new", ownerRef: "owner-a", payloadRef: "new.png" }, new Date(3000));
    await store.create({ id: "other", ownerRef: "owner-b", payloadRef: "other.png" }, new Date(2000));

    const res = await app.inject({ method: "GET", url: "/v1/owners/owner-a/items?limit=5" });
    expect(res.statusCode).toBe(200);
    expect(res.json().items.map((item: { id: string }) => item.id)).toEqual(["new", "old"]);
    expect(res.json().items[0]).toEqual({
      id: "new",
      state: "pending",
      payload_ref: "new.png",
      created_at: "1970-01-01T00:00:03.000Z",
      updated_at: "1970-01-01T00:00:03.000Z",
    });

    const invalid = await app.inject({ method: "GET", url: "/v1/owners/owner-a/items?limit=0" });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json().error.code).toBe("VALIDATION_ERROR");
  });

  it("reports aggregate statistics", async () => {
    await submit({ id: "a", owner_ref: "owner-1", payload_ref: "a.png" });
    await submit({ id: "b", owner_ref: "owner-1", payload_ref: "b.png" });
    await store.tryClaim("a", "w1", NOW);
    await store.commitResult("a", "w1", { ...catResult, processingTimeMs: 40 }, NOW);

    const res = await app.inject({ method: "GET", url: "/v1/stats" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      total: 2,
      by_state: { pending: 1, processing: 0, done: 1, failed: 0 },
      by_label: [{ label: "Cat", count: 1, avg_confidence: 0.95 }],
      average_confidence: 0.95,
      average_processing_time_ms: 40,
    });
  });

  it("renders unknown routes in the error shape", async () => {
    const res = await app.inject({ method: "GET", url: "/v2/items" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: { code: "NOT_FOUND", message: "route GET /v2/items not found" } });
  });
});

describe("api-gateway with an embedded worker pool", () => {
  it("classifies a submitted item end to end", async () => {
    const store = new MemoryWorkItemStore();
    const app = buildServer({ store });
    const config = loadConfig({
      NODE_ENV: "test",
      WORKER_CONCURRENCY: "2",
      WORKER_POLL_INTERVAL_MS: "5",
      WORKER_MAX_IDLE_INTERVAL_MS: "20",
    });
    const payloads: PayloadSource = { load: async (ref) => Buffer.from(ref) };
    const classify = vi.fn(async () => catResult);
    const classifier: ClassificationAdapter = { name: "fake", modelVersion: "fake-v1", classify };
    const pool = await startWorkerPool({ config, store, logger: createLogger("test", "silent"), payloads, classifier });

    try {
      await app.inject({ method: "POST", url: "/v1/items", payload: { id: "img1", owner_ref: "o", payload_ref: "a.png" } });
      await vi.waitFor(async () => {
        const res = await app.inject({ method: "GET", url: "/v1/items/img1/status" });
        expect(res.json().state).toBe("done");
      });

      const res = await app.inject({ method: "GET", url: "/v1/items/img1/status" });
      expect(res.json().result).toMatchObject({ label: "Cat", confidence: 0.95, model_version: "fake-v1" });
      expect(classify).toHaveBeenCalledTimes(1);
    } finally {
      await pool.stop();
      await app.close();
    }
  });
});
