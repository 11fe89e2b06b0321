import { describe, it, expect } from "vitest";
import type { NostrEvent } from "@/types/nostr";
import { getLikeTarget } from "./nip25-helpers";
import { getRepostTarget } from "./nip18-helpers";
import { getContactPubkeys } from "./nip02-helpers";
import { getDeletedAddresses, getDeletedEventIds } from "./nip09-helpers";
import { getCurationSet, getFollowSet } from "./nip51-helpers";

const AUTHOR = "a".repeat(64);
const OTHER = "b".repeat(64);

function createMockEvent(overrides: Partial<NostrEvent> = {}): NostrEvent {
  return {
    id: "test-id",
    pubkey: AUTHOR,
    created_at: 1700000000,
    kind: 1,
    tags: [],
    content: "",
    sig: "test-sig",
    ...overrides,
  };
}

describe("getLikeTarget", () => {
  it("should read the last e and p tags", () => {
    const event = createMockEvent({
      kind: 7,
      content: "+",
      tags: [
        ["e", "root"],
        ["p", "root-author"],
        ["e", "video"],
        ["p", OTHER],
      ],
    });
    expect(getLikeTarget(event)).toEqual({ target: "video", targetAuthor: OTHER });
  });

  it("should omit the author when there is no p tag", () => {
    const event = createMockEvent({ kind: 7, content: "+", tags: [["e", "x"]] });
    expect(getLikeTarget(event)).toEqual({ target: "x" });
  });

  it("should ignore reactions that are not likes", () => {
    const event = createMockEvent({ kind: 7, content: "🔥", tags: [["e", "x"]] });
    expect(getLikeTarget(event)).toBeNull();
  });

  it("should ignore likes without a target", () => {
    expect(getLikeTarget(createMockEvent({ kind: 7, content: "+" }))).toBeNull();
  });

  it("should ignore other kinds", () => {
    const event = createMockEvent({ kind: 1, content: "+", tags: [["e", "x"]] });
    expect(getLikeTarget(event)).toBeNull();
  });
});

describe("getRepostTarget", () => {
  it("should prefer the a coordinate", () => {
    const address = `34236:${OTHER}:clip`;
    const event = createMockEvent({
      kind: 16,
      tags: [
        ["a", address],
        ["e", "video-id"],
      ],
    });
    expect(getRepostTarget(event)).toEqual({ target: address, eventId: "video-id" });
  });

  it("should fall back to the e tag", () => {
    const event = createMockEvent({ kind: 6, tags: [["e", "note-id"]] });
    expect(getRepostTarget(event)).toEqual({ target: "note-id", eventId: "note-id" });
  });

  it("should reject reposts without a target", () => {
    expect(getRepostTarget(createMockEvent({ kind: 16 }))).toBeNull();
  });
});

describe("getContactPubkeys", () => {
  it("should dedupe p tags in order", () => {
    const event = createMockEvent({
      kind: 3,
      tags: [
        ["p", OTHER],
        ["p", AUTHOR],
        ["p", OTHER],
      ],
    });
    expect(getContactPubkeys(event)).toEqual({ pubkeys: [OTHER, AUTHOR] });
  });

  it("should return an empty list for an empty contact list", () => {
    expect(getContactPubkeys(createMockEvent({ kind: 3 }))).toEqual({ pubkeys: [] });
  });

  it("should ignore other kinds", () => {
    expect(getContactPubkeys(createMockEvent({ kind: 1 }))).toBeNull();
  });
});

describe("deletion helpers", () => {
  it("should list deleted event ids", () => {
    const event = createMockEvent({
      kind: 5,
      tags: [
        ["e", "one"],
        ["a", `30000:${AUTHOR}:friends`],
        ["e", "two"],
        ["k", "7"],
      ],
    });
    expect(getDeletedEventIds(event)).toEqual(["one", "two"]);
  });

  it("should ignore other kinds", () => {
    expect(getDeletedEventIds(createMockEvent({ tags: [["e", "x"]] }))).toEqual([]);
  });
});

describe("getDeletedAddresses", () => {
  it("should return well-formed coordinates with their author", () => {
    const event = createMockEvent({
      kind: 5,
      tags: [
        ["a", `30000:${AUTHOR}:skaters`],
        ["a", "not-a-coordinate"],
        ["e", "one"],
      ],
    });

    expect(getDeletedAddresses(event)).toEqual([
      { address: `30000:${AUTHOR}:skaters`, pubkey: AUTHOR },
    ]);
  });
});

describe("getFollowSet", () => {
  it("should parse metadata and members", () => {
    const event = createMockEvent({
      kind: 30000,
      tags: [
        ["d", "skaters"],
        ["title", "Skaters"],
        ["description", "People who skate"],
        ["p", OTHER],
      ],
    });
    expect(getFollowSet(event)).toEqual({
      identifier: "skaters",
      title: "Skaters",
      description: "People who skate",
      pubkeys: [OTHER],
    });
  });

  it("should read the legacy name tag as the title", () => {
    const event = createMockEvent({
      kind: 30000,
      tags: [
        ["d", "x"],
        ["name", "Legacy"],
      ],
    });
    expect(getFollowSet(event)?.title).toBe("Legacy");
  });

  it("should require a d tag", () => {
    const event = createMockEvent({ kind: 30000, tags: [["p", OTHER]] });
    expect(getFollowSet(event)).toBeNull();
  });
});

describe("getCurationSet", () => {
  it("should collect a and e references in tag order", () => {
    const address = `34236:${OTHER}:clip`;
    const event = createMockEvent({
      kind: 30005,
      tags: [
        ["d", "best"],
        ["e", "legacy-video"],
        ["image", "https://example.com/cover.jpg"],
        ["a", address],
      ],
    });
    expect(getCurationSet(event)).toEqual({
      identifier: "best",
      image: "https://example.com/cover.jpg",
      videos: ["legacy-video", address],
    });
  });

  it("should require a d tag", () => {
    expect(getCurationSet(createMockEvent({ kind: 30005 }))).toBeNull();
  });
});
