import type { NostrEvent } from "nostr-tools";
import { DELETION_KIND } from "@/constants/kinds";
import { createLogger } from "@/lib/logger";
import { getDeletedAddresses, getDeletedEventIds } from "@/lib/nip09-helpers";
import { shortKey } from "@/lib/nostr-utils";
import type { ApplyResult, ItemSource } from "@/types/reconcile";
import {
  toReconciledItem,
  type CollectionDefinition,
} from "./collection-definitions";
import type { ReconciledCollection } from "./reconciled-collection";

const logger = createLogger("EventReconciler");

/**
 * A collection together with the definition that feeds it
 */
export interface CollectionBinding<T> {
  definition: CollectionDefinition<T>;
  collection: ReconciledCollection<T>;
}

export type IngestResult =
  | { status: "applied"; collection: string; result: ApplyResult }
  | { status: "deleted"; removed: number }
  | {
      status: "ignored";
      reason: "unknown-kind" | "foreign-deletion" | "foreign-author";
    }
  | { status: "malformed"; collection: string };

type Route = (event: NostrEvent, source: ItemSource) => Promise<IngestResult>;

interface Deletable {
  remove(ids: string[]): Promise<number>;
  removeAddresses(addresses: string[], deletedAt: number): Promise<number>;
}

/**
 * Routes inbound events to the collection that owns their kind
 */
export class EventReconciler {
  private routes = new Map<number, Route>();
  private deletable: Deletable[] = [];
  private owner: string | null = null;

  register<T>(binding: CollectionBinding<T>): void {
    const { definition, collection } = binding;

    const route: Route = async (event, source) => {
      if (definition.ownerScoped && event.pubkey !== this.owner) {
        logger.debug(
          `Ignoring ${definition.name} event ${event.id} from ${shortKey(event.pubkey)}`,
        );
        return { status: "ignored", reason: "foreign-author" };
      }

      const item = toReconciledItem(definition, event, source === "local");
      if (!item) {
        logger.warn(`Dropping malformed ${definition.name} event ${event.id}`);
        return { status: "malformed", collection: definition.name };
      }

      const result = await collection.apply([item], source);
      return { status: "applied", collection: definition.name, result };
    };

    for (const kind of definition.kinds) {
      this.routes.set(kind, route);
    }
    this.deletable.push(collection);
  }

  /**
   * Owner-scoped collections and deletions only accept events from this
   * pubkey
   */
  setOwner(pubkey: string | null): void {
    this.owner = pubkey;
  }

  async ingest(
    event: NostrEvent,
    source: ItemSource = "live",
  ): Promise<IngestResult> {
    if (event.kind === DELETION_KIND) {
      return this.applyDeletion(event);
    }

    const route = this.routes.get(event.kind);
    if (!route) {
      logger.debug(`No collection for kind ${event.kind}`);
      return { status: "ignored", reason: "unknown-kind" };
    }

    return route(event, source);
  }

  private async applyDeletion(event: NostrEvent): Promise<IngestResult> {
    if (event.pubkey !== this.owner) {
      return { status: "ignored", reason: "foreign-deletion" };
    }

    const ids = getDeletedEventIds(event);
    // NIP-09: an address can only be deleted by its author
    const addresses = getDeletedAddresses(event)
      .filter(({ pubkey }) => pubkey === event.pubkey)
      .map(({ address }) => address);

    let removed = 0;
    for (const collection of this.deletable) {
      removed += await collection.remove(ids);
      if (addresses.length > 0) {
        removed += await collection.removeAddresses(addresses, event.created_at);
      }
    }

    logger.debug(`Deletion ${event.id} removed ${removed} items`);
    return { status: "deleted", removed };
  }
}
