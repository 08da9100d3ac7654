import { describe, expect, it } from "vitest";
import { MemoryWorkItemStore } from "./memory-store.js";
import { describeWorkItemStore } from "./store.contract.js";

describeWorkItemStore("memory", async () => new MemoryWorkItemStore());

describe("MemoryWorkItemStore", () => {
  it("hands out copies that cannot change stored state", async () => {
    const store = new MemoryWorkItemStore();
    const created = await store.create({ id: "img1", ownerRef: "o", payloadRef: "img1.png" }, new Date(0));
    created.payloadRef = "tampered.png";

    const fetched = await store.get("img1");
    expect(fetched.payloadRef).toBe("img1.png");
  });

  it("keeps insertion order for items created at the same instant", async () => {
    const store = new MemoryWorkItemStore();
    const now = new Date(0);
    for (const id of ["z", "y", "x"]) {
      await store.create({ id, ownerRef: "o", payloadRef: `${id}.png` }, now);
    }
    const ids: string[] = [];
    for await (const item of store.listPending(10)) ids.push(item.id);
    expect(ids).toEqual(["z", "y", "x"]);
  });
});
