import { describe, expect, it, vi } from "vitest";
import { loadConfig } from "@image-triage/shared";
import { MemoryWorkItemStore } from "@image-triage/store";
import { startWorkerPool } from "./pool.js";
import { FakePayloadSource, catResult, fakeClassifier, silentLogger } from "./testing.js";

const config = loadConfig({
  NODE_ENV: "test",
  WORKER_CONCURRENCY: "2",
  WORKER_POLL_INTERVAL_MS: "5",
  WORKER_MAX_IDLE_INTERVAL_MS: "20",
  PAYLOAD_TIMEOUT_MS: "200",
  CLASSIFY_TIMEOUT_MS: "500",
  RECLAIM_AFTER_MS: "1000",
  RECLAIM_SWEEP_INTERVAL_MS: "10",
});

describe("startWorkerPool", () => {
  it("runs independent loops that drain the store", async () => {
    const store = new MemoryWorkItemStore();
    const payloads = new FakePayloadSource();
    for (const id of ["a", "b", "c", "d"]) {
      payloads.set(`${id}.png`, Buffer.from(id));
      await store.create({ id, ownerRef: "owner-1", payloadRef: `${id}.png` }, new Date());
    }

    const pool = await startWorkerPool({
      config,
      store,
      logger: silentLogger,
      payloads,
      classifier: fakeClassifier(async () => catResult),
    });
    expect(pool.loops).toHaveLength(2);
    expect(new Set(pool.loops.map((loop) => loop.workerId)).size).toBe(2);

    await vi.waitFor(async () => {
      const stats = await store.getStats();
      expect(stats.byState.done).toBe(4);
    });
    await pool.stop();
    expect(pool.loops.every((loop) => loop.stopping)).toBe(true);
  });

  it("recovers an item stranded by a crashed worker", async () => {
    const store = new MemoryWorkItemStore();
    const payloads = new FakePayloadSource().set("img3.png", Buffer.from("img3"));
    await store.create({ id: "img3", ownerRef: "owner-1", payloadRef: "img3.png" }, new Date(0));
    await store.tryClaim("img3", "crashed-worker", new Date(0));

    const pool = await startWorkerPool({
      config,
      store,
      logger: silentLogger,
      payloads,
      classifier: fakeClassifier(async () => catResult),
    });

    await vi.waitFor(async () => {
      expect(await store.get("img3")).toMatchObject({ state: "done", attempts: 2 });
    });
    await pool.stop();
  });
});
