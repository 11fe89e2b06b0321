import { describe, it, expect, vi } from "vitest";
import { ReconciledCollection } from "./reconciled-collection";
import type { ReconciledItem } from "@/types/reconcile";

const OWNER = "a".repeat(64);
const LIST_KEY = `30005:${OWNER}:picks`;

function listItem(
  createdAt: number,
  videos: string[],
  localOnly = false,
): ReconciledItem<{ videos: string[] }> {
  return {
    key: LIST_KEY,
    payload: { videos },
    createdAt,
    localOnly,
    eventId: `list-${createdAt}`,
  };
}

function likeItem(id: string, localOnly = false): ReconciledItem<string> {
  return { key: id, payload: "target", createdAt: 100, localOnly, eventId: id };
}

describe("ReconciledCollection", () => {
  describe("address-keyed items", () => {
    it("should keep the newest version across live and cache sources", async () => {
      const collection = new ReconciledCollection<{ videos: string[] }>({
        name: "curation-sets",
        mode: "address",
      });

      await collection.apply([listItem(200, ["new"])], "live");
      const result = await collection.apply([listItem(100, ["old"])], "cache");

      expect(result).toEqual({
        inserted: 0,
        replaced: 0,
        kept: 1,
        confirmed: 0,
        suppressed: 0,
      });
      expect(collection.get(LIST_KEY)?.payload.videos).toEqual(["new"]);
    });

    it("should replace with a strictly newer cache entry", async () => {
      const collection = new ReconciledCollection<{ videos: string[] }>({
        name: "curation-sets",
        mode: "address",
      });

      await collection.apply([listItem(100, ["old"])], "live");
      await collection.apply([listItem(101, ["newer"])], "cache");

      expect(collection.get(LIST_KEY)?.payload.videos).toEqual(["newer"]);
    });

    it("should keep the first arrival on equal timestamps", async () => {
      const collection = new ReconciledCollection<{ videos: string[] }>({
        name: "curation-sets",
        mode: "address",
      });

      await collection.apply([listItem(100, ["first"])], "live");
      await collection.apply([listItem(100, ["second"])], "live");

      expect(collection.get(LIST_KEY)?.payload.videos).toEqual(["first"]);
    });

    it("should converge when a cache load races a live event", async () => {
      const collection = new ReconciledCollection<{ videos: string[] }>({
        name: "curation-sets",
        mode: "address",
      });

      await Promise.all([
        collection.apply([listItem(100, ["cached"])], "cache"),
        collection.apply([listItem(300, ["live"])], "live"),
        collection.apply([listItem(200, ["cached-later"])], "cache"),
      ]);

      expect(collection.size).toBe(1);
      expect(collection.get(LIST_KEY)?.payload.videos).toEqual(["live"]);
    });
  });

  describe("identifier-keyed items", () => {
    it("should ignore duplicates of the same event", async () => {
      const collection = new ReconciledCollection<string>({
        name: "reactions",
        mode: "id",
      });

      await collection.apply([likeItem("r1")], "live");
      const result = await collection.apply(
        [likeItem("r1"), likeItem("r1")],
        "cache",
      );

      expect(result.kept).toBe(2);
      expect(collection.size).toBe(1);
    });

    it("should confirm a local item when a relay echoes it", async () => {
      const collection = new ReconciledCollection<string>({
        name: "reactions",
        mode: "id",
      });

      await collection.apply([likeItem("r1", true)], "local");
      const result = await collection.apply([likeItem("r1")], "live");

      expect(result.confirmed).toBe(1);
      expect(collection.get("r1")?.localOnly).toBe(false);
    });

    it("should not confirm a local item from the cache", async () => {
      const collection = new ReconciledCollection<string>({
        name: "reactions",
        mode: "id",
      });

      await collection.apply([likeItem("r1", true)], "local");
      await collection.apply([likeItem("r1")], "cache");

      expect(collection.get("r1")?.localOnly).toBe(true);
    });
  });

  describe("remove", () => {
    it("should remove items and suppress late copies", async () => {
      const collection = new ReconciledCollection<string>({
        name: "reactions",
        mode: "id",
      });

      await collection.apply([likeItem("r1"), likeItem("r2")], "live");
      expect(await collection.remove(["r1"])).toBe(1);

      const result = await collection.apply([likeItem("r1")], "cache");

      expect(result.suppressed).toBe(1);
      expect(collection.has("r1")).toBe(false);
      expect(collection.has("r2")).toBe(true);
      expect(collection.isDeleted("r1")).toBe(true);
    });

    it("should suppress an item deleted before it arrived", async () => {
      const collection = new ReconciledCollection<string>({
        name: "reactions",
        mode: "id",
      });

      expect(await collection.remove(["r1"])).toBe(0);
      await collection.apply([likeItem("r1")], "live");

      expect(collection.size).toBe(0);
    });

    it("should delete an address up to the deletion time only", async () => {
      const collection = new ReconciledCollection<{ videos: string[] }>({
        name: "curation-sets",
        mode: "address",
      });

      await collection.apply([listItem(100, ["v1"])], "live");
      expect(await collection.removeAddresses([LIST_KEY], 150)).toBe(1);
      expect(collection.has(LIST_KEY)).toBe(false);

      const stale = await collection.apply([listItem(120, ["v1"])], "cache");
      expect(stale.suppressed).toBe(1);

      const newer = await collection.apply([listItem(200, ["v2"])], "live");
      expect(newer.inserted).toBe(1);
      expect(collection.get(LIST_KEY)?.payload.videos).toEqual(["v2"]);
    });

    it("should keep a version newer than the address deletion", async () => {
      const collection = new ReconciledCollection<{ videos: string[] }>({
        name: "curation-sets",
        mode: "address",
      });

      await collection.apply([listItem(300, ["v3"])], "live");

      expect(await collection.removeAddresses([LIST_KEY], 150)).toBe(0);
      expect(collection.get(LIST_KEY)?.createdAt).toBe(300);
    });
  });

  describe("change notifications", () => {
    it("should call onChange once per changing batch", async () => {
      const onChange = vi.fn().mockResolvedValue(undefined);
      const collection = new ReconciledCollection<string>({
        name: "reactions",
        mode: "id",
        onChange,
      });

      await collection.apply([likeItem("r1"), likeItem("r2")], "live");
      await collection.apply([likeItem("r1")], "live");
      await collection.remove(["r2"]);

      expect(onChange).toHaveBeenCalledTimes(2);
      expect(onChange).toHaveBeenCalledWith(collection);
    });

    it("should emit snapshots on items$", async () => {
      const collection = new ReconciledCollection<string>({
        name: "reactions",
        mode: "id",
      });
      const sizes: number[] = [];
      collection.items$.subscribe((items) => sizes.push(items.length));

      await collection.apply([likeItem("r1")], "live");
      await collection.apply([likeItem("r2")], "live");
      await collection.clear();

      expect(sizes).toEqual([0, 1, 2, 0]);
    });

    it("should keep working when onChange fails", async () => {
      const collection = new ReconciledCollection<string>({
        name: "reactions",
        mode: "id",
        onChange: () => Promise.reject(new Error("disk full")),
      });
      const consoleError = vi
        .spyOn(console, "error")
        .mockImplementation(() => {});

      await collection.apply([likeItem("r1")], "live");

      expect(collection.has("r1")).toBe(true);
      expect(consoleError).toHaveBeenCalled();
      consoleError.mockRestore();
    });
  });
});
