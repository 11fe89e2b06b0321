import { describe, it, expect, vi, afterEach } from "vitest";
import { NEVER, Subject } from "rxjs";
import type { SubscriptionTransport } from "subscription-engine";
import { createSyncEngine } from "./sync-engine";
import { createSyncDb } from "./db";
import type { KeyValueStore } from "./key-value-store";
import type { RelayPoolLike } from "./relay-pool";
import { ConfigError, type SyncErrorReport } from "@/lib/errors";
import type { NostrEvent } from "@/types/nostr";

const OWNER = "a".repeat(64);

const idleTransport: SubscriptionTransport = { subscribe: () => NEVER };

function createMockPool(): RelayPoolLike {
  return {
    subscription: vi.fn(() => new Subject<NostrEvent | "EOSE">()),
    request: vi.fn(() => new Subject<NostrEvent>()),
    publish: vi.fn(async () => [{ ok: true, from: "wss://relay.example.com" }]),
  };
}

function createLike(id: string): NostrEvent {
  return {
    id,
    pubkey: OWNER,
    created_at: 1,
    kind: 7,
    tags: [["e", "video-1"]],
    content: "+",
    sig: "test-sig",
  };
}

describe("createSyncEngine", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should require a transport or a relay pool", () => {
    expect(() => createSyncEngine()).toThrow(ConfigError);
    expect(() => createSyncEngine()).toThrow(
      "Invalid transport: provide a transport or a relay pool",
    );
  });

  it("should require relays with a pool", () => {
    expect(() => createSyncEngine({ pool: createMockPool(), relays: [] })).toThrow(
      "Invalid relays: a relay pool needs at least one relay",
    );
  });

  it("should require a pool to publish with a signer", () => {
    expect(() =>
      createSyncEngine({
        transport: idleTransport,
        signer: { getPublicKey: async () => OWNER, signEvent: vi.fn() },
      }),
    ).toThrow("Invalid signer: publishing needs a relay pool and relays");
  });

  it("should reject invalid limits", () => {
    expect(() =>
      createSyncEngine({ transport: idleTransport, maxConcurrentSubscriptions: -1 }),
    ).toThrow(ConfigError);
  });

  it("should pass configuration to the subscription manager", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const engine = createSyncEngine({
      transport: idleTransport,
      maxConcurrentSubscriptions: 2,
      maxEventsPerMinute: 50,
    });

    const stats = engine.manager.getStats();
    expect(stats.maxSubscriptions).toBe(2);
    expect(stats.maxEventsPerMinute).toBe(50);

    await engine.dispose();
  });

  it("should subscribe through the relay pool", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const pool = createMockPool();
    const relays = ["wss://relay.example.com"];
    const engine = createSyncEngine({ pool, relays });

    await engine.social.start(OWNER);

    expect(pool.subscription).toHaveBeenCalledTimes(6);
    expect(pool.subscription).toHaveBeenCalledWith(relays, [
      { kinds: [3], authors: [OWNER], limit: 1 },
    ]);

    await engine.dispose();
  });

  it("should cache in IndexedDB when it is available", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const engine = createSyncEngine({
      transport: idleTransport,
      databaseName: "vine-sync-engine-test",
    });

    await engine.social.start(OWNER);
    await engine.reconciler.ingest(createLike("like-1"));
    await engine.dispose();

    const db = createSyncDb("vine-sync-engine-test");
    expect(await db.collections.toCollection().primaryKeys()).toEqual([
      `vine-sync:reactions:${OWNER}`,
    ]);
    await db.delete();
  });

  it("should report persistence failures on errors$", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    const failingStore: KeyValueStore = {
      getItem: async () => null,
      setItem: () => Promise.reject(new Error("quota exceeded")),
      removeItem: async () => {},
      keys: async () => [],
    };
    const engine = createSyncEngine({
      transport: idleTransport,
      store: failingStore,
      now: () => 1000,
    });
    const reports: SyncErrorReport[] = [];
    engine.errors$.subscribe((report) => reports.push(report));

    await engine.social.start(OWNER);
    await engine.reconciler.ingest(createLike("like-1"));

    expect(reports).toHaveLength(1);
    expect(reports[0]).toMatchObject({
      source: "persist",
      collection: "reactions",
      timestamp: 1000,
    });
    expect(reports[0].error.message).toBe("quota exceeded");
    expect(engine.social.isLiked("video-1")).toBe(true);

    await engine.dispose();
  });

  it("should cancel everything and complete errors$ on dispose", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const engine = createSyncEngine({ transport: idleTransport });
    const complete = vi.fn();
    engine.errors$.subscribe({ complete });

    await engine.social.start(OWNER);
    expect(engine.manager.activeCount).toBe(6);

    await engine.dispose();

    expect(engine.manager.activeCount).toBe(0);
    expect(complete).toHaveBeenCalled();
    await expect(
      engine.manager.createSubscription({
        name: "late",
        filters: [{ kinds: [1] }],
        onEvent: () => {},
      }),
    ).rejects.toThrow("SubscriptionManager has been disposed");
  });
});
