import { RelayPool } from "applesauce-relay";
import { onlyEvents } from "applesauce-relay/operators";
import { finalizeEvent, getPublicKey } from "nostr-tools/pure";
import type { EventTemplate, Filter, NostrEvent } from "nostr-tools";
import type { Observable } from "rxjs";
import type { SubscriptionTransport } from "subscription-engine";
import { WebSocket } from "ws";
import { PublishError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const logger = createLogger("RelayPool");

export interface PublishResponse {
  ok: boolean;
  message?: string;
  from: string;
}

/**
 * The parts of applesauce-relay's RelayPool the engine uses
 */
export interface RelayPoolLike {
  subscription(
    relays: string[],
    filters: Filter[],
  ): Observable<NostrEvent | "EOSE">;
  /** Completes after EOSE */
  request(relays: string[], filters: Filter[]): Observable<NostrEvent>;
  publish(relays: string[], event: NostrEvent): Promise<PublishResponse[]>;
}

export interface EventSigner {
  getPublicKey(): Promise<string>;
  signEvent(template: EventTemplate): Promise<NostrEvent>;
}

/**
 * Signs and publishes events built by the social layer
 */
export interface SocialPublisher {
  getPublicKey(): Promise<string>;
  signEvent(template: EventTemplate): Promise<NostrEvent>;
  publish(event: NostrEvent): Promise<void>;
}

/**
 * Create a RelayPool that can open sockets under Node
 */
export function createRelayPool(): RelayPool {
  if (!("WebSocket" in globalThis)) {
    Object.assign(globalThis, { WebSocket });
  }
  return new RelayPool();
}

/**
 * Subscription transport over a relay pool. Live subscriptions drop EOSE
 * markers and stay open; one-shot queries use `pool.request()`, which
 * completes after EOSE.
 */
export function createPoolTransport(
  pool: RelayPoolLike,
  relays: string[],
): SubscriptionTransport {
  return {
    subscribe: (filters, options) =>
      options?.closeOnEose
        ? pool.request(relays, filters)
        : pool.subscription(relays, filters).pipe(onlyEvents()),
  };
}

/**
 * Signer over a raw secret key
 */
export function createSecretKeySigner(secretKey: Uint8Array): EventSigner {
  const pubkey = getPublicKey(secretKey);
  return {
    getPublicKey: async () => pubkey,
    signEvent: async (template) => finalizeEvent(template, secretKey),
  };
}

/**
 * Publisher that signs with `signer` and succeeds when any relay accepts
 */
export function createPoolPublisher(
  pool: RelayPoolLike,
  relays: string[],
  signer: EventSigner,
): SocialPublisher {
  return {
    getPublicKey: () => signer.getPublicKey(),
    signEvent: (template) => signer.signEvent(template),
    publish: async (event) => {
      const responses = await pool.publish(relays, event);
      const accepted = responses.filter((response) => response.ok);

      if (accepted.length === 0) {
        const reasons = responses
          .map((r) => `${r.from}: ${r.message ?? "rejected"}`)
          .join(", ");
        throw new PublishError(
          `No relay accepted event ${event.id}${reasons ? ` (${reasons})` : ""}`,
        );
      }

      logger.debug(
        `Published ${event.id} to ${accepted.length}/${responses.length} relays`,
      );
    },
  };
}
