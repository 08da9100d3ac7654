import { describe, expect, it } from "vitest";
import { MemoryWorkItemStore } from "@image-triage/store";
import { ResultRecorder } from "./recorder.js";
import { catResult, silentLogger } from "./testing.js";

const clock = () => new Date("2026-03-01T09:01:00.000Z");

const claimed = async () => {
  const store = new MemoryWorkItemStore();
  await store.create({ id: "img1", ownerRef: "o", payloadRef: "img1.png" }, new Date("2026-03-01T09:00:00.000Z"));
  await store.tryClaim("img1", "w1", new Date("2026-03-01T09:00:30.000Z"));
  return store;
};

describe("ResultRecorder", () => {
  it("commits a result for the current holder", async () => {
    const store = await claimed();
    const recorder = new ResultRecorder(store, silentLogger, clock);

    expect(await recorder.recordResult("img1", "w1", catResult)).toBe("committed");
    expect(await store.get("img1")).toMatchObject({
      state: "done",
      result: catResult,
      updatedAt: "2026-03-01T09:01:00.000Z",
    });
  });

  it("commits a failure reason", async () => {
    const store = await claimed();
    const recorder = new ResultRecorder(store, silentLogger, clock);

    expect(await recorder.recordFailure("img1", "w1", { kind: "Timeout", detail: "classification timed out after 5ms" })).toBe(
      "committed",
    );
    expect(await store.get("img1")).toMatchObject({
      state: "failed",
      failureReason: { kind: "Timeout", detail: "classification timed out after 5ms" },
    });
  });

  it("discards outcomes whose claim went stale", async () => {
    const store = await claimed();
    await store.reclaimStale(0, clock());
    await store.tryClaim("img1", "w2", clock());
    const before = await store.get("img1");
    const recorder = new ResultRecorder(store, silentLogger, clock);

    expect(await recorder.recordResult("img1", "w1", catResult)).toBe("discarded");
    expect(await recorder.recordFailure("img1", "w1", { kind: "AdapterError", detail: "x" })).toBe("discarded");
    expect(await recorder.release("img1", "w1")).toBe("discarded");
    expect(await store.get("img1")).toEqual(before);
  });

  it("releases a claim back to pending", async () => {
    const store = await claimed();
    const recorder = new ResultRecorder(store, silentLogger, clock);

    expect(await recorder.release("img1", "w1")).toBe("committed");
    expect((await store.get("img1")).state).toBe("pending");
  });
});
