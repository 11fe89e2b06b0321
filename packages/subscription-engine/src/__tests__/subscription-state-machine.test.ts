import { describe, it, expect } from "vitest";
import {
  transitionSubscriptionState,
  type SubscriptionSignal,
} from "../subscription-state-machine.js";
import type { SubscriptionStatus } from "../types.js";

describe("Subscription State Machine", () => {
  describe("active state", () => {
    it("should transition to cancelled on CANCEL", () => {
      const result = transitionSubscriptionState("active", { type: "CANCEL" });
      expect(result.newStatus).toBe("cancelled");
      expect(result.release).toBe(true);
      expect(result.notifyComplete).toBe(false);
      expect(result.scheduleRetry).toBe(false);
    });

    it("should transition to timed_out on TIMEOUT", () => {
      const result = transitionSubscriptionState("active", { type: "TIMEOUT" });
      expect(result.newStatus).toBe("timed_out");
      expect(result.release).toBe(true);
    });

    it("should transition to completed and notify on COMPLETE", () => {
      const result = transitionSubscriptionState("active", { type: "COMPLETE" });
      expect(result.newStatus).toBe("completed");
      expect(result.release).toBe(true);
      expect(result.notifyComplete).toBe(true);
      expect(result.notifyError).toBe(false);
    });

    it("should transition to evicted on EVICT without callbacks", () => {
      const result = transitionSubscriptionState("active", { type: "EVICT" });
      expect(result.newStatus).toBe("evicted");
      expect(result.release).toBe(true);
      expect(result.notifyComplete).toBe(false);
      expect(result.notifyError).toBe(false);
      expect(result.scheduleRetry).toBe(false);
    });

    it("should transition to errored and schedule a retry on ERROR", () => {
      const result = transitionSubscriptionState("active", {
        type: "ERROR",
        error: new Error("relay closed"),
      });
      expect(result.newStatus).toBe("errored");
      expect(result.release).toBe(true);
      expect(result.notifyError).toBe(true);
      expect(result.scheduleRetry).toBe(true);
    });
  });

  describe("terminal states", () => {
    const terminal: SubscriptionStatus[] = [
      "cancelled",
      "timed_out",
      "completed",
      "evicted",
      "errored",
    ];
    const signals: SubscriptionSignal[] = [
      { type: "CANCEL" },
      { type: "TIMEOUT" },
      { type: "COMPLETE" },
      { type: "EVICT" },
      { type: "ERROR", error: "late" },
    ];

    for (const status of terminal) {
      it(`should ignore every signal once ${status}`, () => {
        for (const signal of signals) {
          const result = transitionSubscriptionState(status, signal);
          expect(result.newStatus).toBe(status);
          expect(result.release).toBe(false);
          expect(result.scheduleRetry).toBe(false);
        }
      });
    }
  });
});
