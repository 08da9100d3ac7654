import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ClassificationResult, WorkItem } from "@image-triage/shared";
import type { WorkItemStore } from "./store.js";

const T0 = Date.parse("2026-03-01T09:00:00.000Z");
const at = (offsetMs: number) => new Date(T0 + offsetMs);
const MINUTE = 60_000;

const catResult: ClassificationResult = {
  label: "Cat",
  confidence: 0.95,
  scoreDistribution: { Cat: 0.95, Dog: 0.04, Bird: 0.01 },
};

const collect = async <T>(source: AsyncIterable<T>): Promise<T[]> => {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
};

/** Behaviour every WorkItemStore implementation has to share. */
export const describeWorkItemStore = (name: string, open: () => Promise<WorkItemStore>) => {
  describe(`${name} work item store`, () => {
    let store: WorkItemStore;

    const seed = (id: string, offsetMs = 0, ownerRef = "owner-1") =>
      store.create({ id, ownerRef, payloadRef: `${id}.png` }, at(offsetMs));

    beforeEach(async () => {
      store = await open();
    });

    afterEach(async () => {
      await store.close();
    });

    it("creates pending items", async () => {
      const item = await seed("img1");
      expect(item).toEqual({
        id: "img1",
        ownerRef: "owner-1",
        payloadRef: "img1.png",
        state: "pending",
        createdAt: "2026-03-01T09:00:00.000Z",
        updatedAt: "2026-03-01T09:00:00.000Z",
        attempts: 0,
      });
      expect(await store.get("img1")).toEqual(item);
    });

    it("rejects duplicate ids and unknown lookups", async () => {
      await seed("img1");
      await expect(seed("img1", 5)).rejects.toMatchObject({ code: "DUPLICATE_ID", itemId: "img1" });
      await expect(store.get("missing")).rejects.toMatchObject({ code: "NOT_FOUND", itemId: "missing" });
      await expect(store.tryClaim("missing", "w1", at(1))).rejects.toMatchObject({ code: "NOT_FOUND" });
      await expect(store.commitResult("missing", "w1", catResult, at(1))).rejects.toMatchObject({ code: "NOT_FOUND" });
    });

    it("claims a pending item once", async () => {
      await seed("img1");
      const first = await store.tryClaim("img1", "w1", at(1000));
      expect(first).toEqual({
        status: "claimed",
        item: expect.objectContaining({
          state: "processing",
          claimToken: "w1",
          attempts: 1,
          updatedAt: "2026-03-01T09:00:01.000Z",
        }),
      });

      const before = await store.get("img1");
      expect(await store.tryClaim("img1", "w2", at(2000))).toEqual({ status: "already_claimed" });
      expect(await store.get("img1")).toEqual(before);
    });

    it("resolves concurrent claims to a single winner", async () => {
      await seed("img2");
      const outcomes = await Promise.all([store.tryClaim("img2", "w1", at(10)), store.tryClaim("img2", "w2", at(10))]);
      const winners = outcomes.filter((outcome) => outcome.status === "claimed");
      const losers = outcomes.filter((outcome) => outcome.status === "already_claimed");
      expect(winners).toHaveLength(1);
      expect(losers).toHaveLength(1);

      const stored = await store.get("img2");
      expect(stored.state).toBe("processing");
      expect(stored.state === "processing" && stored.claimToken).toBe(outcomes[0].status === "claimed" ? "w1" : "w2");
    });

    it("commits a result for the claim holder", async () => {
      await seed("img1");
      await store.tryClaim("img1", "w1", at(1000));
      const outcome = await store.commitResult("img1", "w1", catResult, at(2000));
      expect(outcome.status).toBe("committed");

      const item = await store.get("img1");
      expect(item).toEqual({
        id: "img1",
        ownerRef: "owner-1",
        payloadRef: "img1.png",
        state: "done",
        result: catResult,
        createdAt: "2026-03-01T09:00:00.000Z",
        updatedAt: "2026-03-01T09:00:02.000Z",
        attempts: 1,
      });
      expect(item).not.toHaveProperty("claimToken");
      expect(item).not.toHaveProperty("failureReason");
    });

    it("reports a stale claim and leaves the item unchanged", async () => {
      await seed("img1");
      await store.tryClaim("img1", "w1", at(1000));
      const before = await store.get("img1");

      expect(await store.commitResult("img1", "w2", catResult, at(2000))).toEqual({ status: "stale_claim" });
      expect(
        await store.commitFailure("img1", "w2", { kind: "AdapterError", detail: "corrupt image" }, at(2000)),
      ).toEqual({ status: "stale_claim" });
      expect(await store.releaseClaim("img1", "w2", at(2000))).toEqual({ status: "stale_claim" });
      expect(await store.get("img1")).toEqual(before);
    });

    it("commits a failure with its reason", async () => {
      await seed("img4");
      await store.tryClaim("img4", "w1", at(1000));
      await store.commitFailure("img4", "w1", { kind: "AdapterError", detail: "corrupt image" }, at(3000));

      const item = await store.get("img4");
      expect(item.state).toBe("failed");
      expect(item.state === "failed" && item.failureReason).toEqual({ kind: "AdapterError", detail: "corrupt image" });
      expect(item).not.toHaveProperty("result");
      expect(item).not.toHaveProperty("claimToken");
    });

    it("never moves a terminal item", async () => {
      await seed("img1");
      await store.tryClaim("img1", "w1", at(1000));
      await store.commitResult("img1", "w1", catResult, at(2000));
      const done = await store.get("img1");

      expect(await store.tryClaim("img1", "w2", at(3000))).toEqual({ status: "already_claimed" });
      expect(
        await store.commitFailure("img1", "w1", { kind: "Timeout", detail: "late" }, at(3000)),
      ).toEqual({ status: "stale_claim" });
      expect(await store.reclaimStale(MINUTE, at(60 * MINUTE))).toEqual([]);
      expect(await store.get("img1")).toEqual(done);
    });

    it("releases a claim back to pending", async () => {
      await seed("img1");
      await store.tryClaim("img1", "w1", at(1000));
      const outcome = await store.releaseClaim("img1", "w1", at(1500));
      expect(outcome.status).toBe("committed");

      const item = await store.get("img1");
      expect(item).toMatchObject({ state: "pending", attempts: 1, updatedAt: "2026-03-01T09:00:01.500Z" });
      expect(item).not.toHaveProperty("claimToken");
      expect((await store.tryClaim("img1", "w2", at(2000))).status).toBe("claimed");
    });

    it("lists pending items oldest first within the limit", async () => {
      await seed("c", 3000);
      await seed("a", 1000);
      await seed("b", 2000);
      await seed("claimed", 500);
      await store.tryClaim("claimed", "w1", at(4000));

      expect((await collect(store.listPending(10))).map((item) => item.id)).toEqual(["a", "b", "c"]);
      expect((await collect(store.listPending(2))).map((item) => item.id)).toEqual(["a", "b"]);
      expect((await collect(store.listPending(2))).map((item) => item.id)).toEqual(["a", "b"]);
    });

    it("reclaims claims older than the threshold", async () => {
      await seed("img3");
      await seed("fresh");
      await store.tryClaim("img3", "w1", at(0));
      await store.tryClaim("fresh", "w1", at(9 * MINUTE));

      expect(await store.reclaimStale(5 * MINUTE, at(10 * MINUTE))).toEqual(["img3"]);

      const item = await store.get("img3");
      expect(item).toMatchObject({ state: "pending", updatedAt: "2026-03-01T09:10:00.000Z" });
      expect(item).not.toHaveProperty("claimToken");
      expect((await store.get("fresh")).state).toBe("processing");

      expect((await store.tryClaim("img3", "w2", at(11 * MINUTE))).status).toBe("claimed");
      expect(await store.commitResult("img3", "w1", catResult, at(12 * MINUTE))).toEqual({ status: "stale_claim" });
      expect((await store.commitResult("img3", "w2", catResult, at(12 * MINUTE))).status).toBe("committed");
    });

    it("lists an owner's items newest first", async () => {
      await seed("old", 1000, "owner-a");
      await seed("other", 2000, "owner-b");
      await seed("mid", 3000, "owner-a");
      await seed("new", 4000, "owner-a");

      const ids = (await store.listByOwner("owner-a", 2)).map((item: WorkItem) => item.id);
      expect(ids).toEqual(["new", "mid"]);
    });

    it("aggregates statistics", async () => {
      const finish = async (id: string, result: ClassificationResult) => {
        await seed(id);
        await store.tryClaim(id, "w1", at(1));
        await store.commitResult(id, "w1", result, at(2));
      };
      await finish("a", { label: "Cat", confidence: 0.9, scoreDistribution: { Cat: 0.9 }, processingTimeMs: 100 });
      await finish("b", { label: "Cat", confidence: 0.7, scoreDistribution: { Cat: 0.7 }, processingTimeMs: 300 });
      await finish("c", { label: "Dog", confidence: 0.5, scoreDistribution: { Dog: 0.5 } });
      await seed("d");
      await store.tryClaim("d", "w1", at(1));
      await store.commitFailure("d", "w1", { kind: "Timeout", detail: "classification timed out" }, at(2));
      await seed("e");

      const stats = await store.getStats();
      expect(stats.total).toBe(5);
      expect(stats.byState).toEqual({ pending: 1, processing: 0, done: 3, failed: 1 });
      expect(stats.byLabel.map((entry) => [entry.label, entry.count])).toEqual([
        ["Cat", 2],
        ["Dog", 1],
      ]);
      expect(stats.byLabel[0].avgConfidence).toBeCloseTo(0.8);
      expect(stats.averageConfidence).toBeCloseTo(0.7);
      expect(stats.averageProcessingTimeMs).toBeCloseTo(200);
    });
  });
};
