import { describe, it, expect } from "vitest";
import {
  buildAddress,
  getEventAddress,
  getTagValues,
  parseAddress,
} from "./nostr-utils";
import type { NostrEvent } from "@/types/nostr";

const PUBKEY = "a".repeat(64);

function createMockEvent(overrides: Partial<NostrEvent> = {}): NostrEvent {
  return {
    id: "test-id",
    pubkey: PUBKEY,
    created_at: 1700000000,
    kind: 1,
    tags: [],
    content: "",
    sig: "test-sig",
    ...overrides,
  };
}

describe("getTagValues", () => {
  it("should return every value for a tag name in order", () => {
    const event = createMockEvent({
      tags: [
        ["p", "one"],
        ["e", "skip"],
        ["p", "two"],
      ],
    });
    expect(getTagValues(event, "p")).toEqual(["one", "two"]);
  });

  it("should skip tags without a value", () => {
    const event = createMockEvent({ tags: [["p"], ["p", ""], ["p", "x"]] });
    expect(getTagValues(event, "p")).toEqual(["x"]);
  });
});

describe("buildAddress", () => {
  it("should join kind, pubkey and d-tag", () => {
    expect(buildAddress(30000, PUBKEY, "friends")).toBe(
      `30000:${PUBKEY}:friends`,
    );
  });

  it("should use an empty d-tag by default", () => {
    expect(buildAddress(3, PUBKEY)).toBe(`3:${PUBKEY}:`);
  });
});

describe("getEventAddress", () => {
  it("should use an empty d-tag for replaceable kinds", () => {
    expect(getEventAddress(createMockEvent({ kind: 3 }))).toBe(
      `3:${PUBKEY}:`,
    );
  });

  it("should use the d-tag for parameterized replaceable kinds", () => {
    const event = createMockEvent({ kind: 30005, tags: [["d", "picks"]] });
    expect(getEventAddress(event)).toBe(`30005:${PUBKEY}:picks`);
  });

  it("should return null when a parameterized kind has no d-tag", () => {
    expect(getEventAddress(createMockEvent({ kind: 30000 }))).toBeNull();
  });
});

describe("parseAddress", () => {
  it("should split a coordinate", () => {
    expect(parseAddress(`34236:${PUBKEY}:clip`)).toEqual({
      kind: 34236,
      pubkey: PUBKEY,
      identifier: "clip",
    });
  });

  it("should keep colons inside the identifier", () => {
    expect(parseAddress(`30000:${PUBKEY}:a:b`)?.identifier).toBe("a:b");
  });

  it("should reject malformed coordinates", () => {
    expect(parseAddress("nope")).toBeNull();
    expect(parseAddress(`x:${PUBKEY}:d`)).toBeNull();
    expect(parseAddress("30000::d")).toBeNull();
  });
});
