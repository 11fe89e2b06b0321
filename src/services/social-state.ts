import type { EventTemplate, Filter, NostrEvent } from "nostr-tools";
import { filter, take } from "rxjs";
import type { SubscriptionManager } from "subscription-engine";
import {
  COUNT_QUERY_PRIORITY,
  FOLLOWER_STATS_TIMEOUT,
  LIKE_COUNT_TIMEOUT,
} from "@/constants/app";
import {
  ADDRESSABLE_SHORT_VIDEO_KIND,
  CONTACTS_KIND,
  DELETION_KIND,
  FOLLOW_SET_KIND,
  GENERIC_REPOST_KIND,
  REACTION_KIND,
  REPOST_KIND,
  VIDEO_CURATION_SET_KIND,
} from "@/constants/kinds";
import {
  buildContactListTemplate,
  buildDeletionTemplate,
  buildFollowSetTemplate,
  buildLikeTemplate,
  buildRepostTemplate,
  type TargetEvent,
} from "@/lib/event-builders";
import {
  NotAuthenticatedError,
  PublishError,
  SyncError,
  toError,
  type SyncErrorReport,
} from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { getContactPubkeys } from "@/lib/nip02-helpers";
import { getLikeTarget } from "@/lib/nip25-helpers";
import { buildAddress, shortKey } from "@/lib/nostr-utils";
import type {
  ContactListPayload,
  CurationSetPayload,
  FollowSetPayload,
  ReactionPayload,
  ReconciledItem,
  RepostPayload,
} from "@/types/reconcile";
import type { CachePersister } from "./cache-persister";
import type { CollectionBinding, EventReconciler } from "./event-reconciler";
import type { SocialPublisher } from "./relay-pool";

const logger = createLogger("SocialState");

/** Name prefix of every subscription this layer opens */
export const SOCIAL_SUBSCRIPTION_PREFIX = "social_";

export interface SocialBindings {
  reactions: CollectionBinding<ReactionPayload>;
  reposts: CollectionBinding<RepostPayload>;
  contacts: CollectionBinding<ContactListPayload>;
  followSets: CollectionBinding<FollowSetPayload>;
  curationSets: CollectionBinding<CurationSetPayload>;
}

export interface SocialStateOptions {
  manager: SubscriptionManager;
  reconciler: EventReconciler;
  persister: CachePersister;
  bindings: SocialBindings;
  publisher?: SocialPublisher;
  now?: () => number;
  /** Receives live events the reconciler failed to apply */
  onError?: (report: SyncErrorReport) => void;
}

export interface StartOptions {
  /** Extra authors whose curation sets are followed */
  curators?: string[];
}

export interface NewFollowSet {
  title: string;
  description?: string;
  image?: string;
  pubkeys?: string[];
  /** d-tag; generated from the clock when omitted */
  identifier?: string;
}

export type FollowSetChanges = Pick<
  FollowSetPayload,
  "title" | "description" | "image"
>;

export interface LikeStatus {
  count: number;
  userLiked: boolean;
}

export interface FollowerStats {
  followers: number;
  following: number;
}

interface SocialSubscription {
  name: string;
  filters: Filter[];
  priority: number;
}

/**
 * The current user's likes, reposts, follows and lists
 *
 * Reads come from reconciled collections fed by managed subscriptions and
 * the local cache. Mutations sign and publish an event, then reconcile it
 * locally.
 */
export class SocialState {
  private pubkey: string | null = null;
  /** Bumped by start() and stop(); a start() that sees another value gives up */
  private session = 0;
  private querySequence = 0;
  private readonly manager: SubscriptionManager;
  private readonly reconciler: EventReconciler;
  private readonly persister: CachePersister;
  private readonly bindings: SocialBindings;
  private publisher?: SocialPublisher;
  private readonly now: () => number;
  private readonly onError?: (report: SyncErrorReport) => void;

  constructor(options: SocialStateOptions) {
    this.manager = options.manager;
    this.reconciler = options.reconciler;
    this.persister = options.persister;
    this.bindings = options.bindings;
    this.publisher = options.publisher;
    this.now = options.now ?? Date.now;
    this.onError = options.onError;
  }

  get activePubkey(): string | null {
    return this.pubkey;
  }

  setPublisher(publisher: SocialPublisher | undefined): void {
    this.publisher = publisher;
  }

  /**
   * Load cached state for `pubkey`, then subscribe to its live state.
   * A stop() or another start() while this runs wins; this call then opens
   * nothing further.
   */
  async start(pubkey: string, options: StartOptions = {}): Promise<void> {
    if (this.pubkey === pubkey) return;
    if (this.pubkey) await this.stop();

    const session = ++this.session;
    this.pubkey = pubkey;
    this.persister.setOwner(pubkey);
    this.reconciler.setOwner(pubkey);

    const { reactions, reposts, contacts, followSets, curationSets } =
      this.bindings;
    await Promise.all([
      this.persister.load(reactions.collection, reactions.definition),
      this.persister.load(reposts.collection, reposts.definition),
      this.persister.load(contacts.collection, contacts.definition),
      this.persister.load(followSets.collection, followSets.definition),
      this.persister.load(curationSets.collection, curationSets.definition),
    ]);

    for (const subscription of this.buildSubscriptions(pubkey, options)) {
      if (this.session !== session) return;

      const id = await this.manager.createSubscription({
        ...subscription,
        onEvent: (event) => this.ingestLive(event),
        onError: (error) =>
          logger.warn(`${subscription.name} failed, retry scheduled`, error),
      });

      if (this.session !== session) {
        this.manager.cancelSubscription(id);
        return;
      }
    }

    logger.info(`Started social sync for ${shortKey(pubkey)}`);
  }

  /**
   * Cancel the user's subscriptions and drop in-memory state. Cached blobs
   * stay in storage.
   */
  async stop(): Promise<void> {
    if (!this.pubkey) return;

    this.session++;
    this.manager.cancelSubscriptionsByName(SOCIAL_SUBSCRIPTION_PREFIX);
    this.pubkey = null;
    this.persister.setOwner(null);
    this.reconciler.setOwner(null);

    await Promise.all(
      Object.values(this.bindings).map((binding) => binding.collection.clear()),
    );
  }

  // --- Reads ---

  isLiked(eventId: string): boolean {
    return this.getLikeEventIds(eventId).length > 0;
  }

  get likedEventIds(): string[] {
    return Array.from(
      new Set(
        this.bindings.reactions.collection
          .values()
          .map((item) => item.payload.target),
      ),
    );
  }

  /**
   * @param video - Addressable video coordinate parts, matched against `a` tags
   */
  hasReposted(
    eventId: string,
    video?: { pubkey: string; dTag: string },
  ): boolean {
    const address = video
      ? buildAddress(ADDRESSABLE_SHORT_VIDEO_KIND, video.pubkey, video.dTag)
      : undefined;
    return this.getRepostEventIds(eventId, address).length > 0;
  }

  get repostedTargets(): string[] {
    return this.bindings.reposts.collection
      .values()
      .map((item) => item.payload.target);
  }

  isFollowing(pubkey: string): boolean {
    return this.followingPubkeys.includes(pubkey);
  }

  get followingPubkeys(): string[] {
    return this.getContactList()?.payload.pubkeys ?? [];
  }

  get followSets(): FollowSetPayload[] {
    return this.bindings.followSets.collection
      .values()
      .map((item) => item.payload);
  }

  getFollowSet(identifier: string): FollowSetPayload | undefined {
    return this.getFollowSetItem(identifier)?.payload;
  }

  isInFollowSet(identifier: string, pubkey: string): boolean {
    return this.getFollowSet(identifier)?.pubkeys.includes(pubkey) ?? false;
  }

  get curationSets(): CurationSetPayload[] {
    return this.bindings.curationSets.collection
      .values()
      .map((item) => item.payload);
  }

  // --- Mutations ---

  /**
   * Like `target`, or remove the existing like
   * @returns Whether the target is liked afterwards
   */
  async toggleLike(target: TargetEvent): Promise<boolean> {
    const publisher = this.requirePublisher();
    const likeIds = this.getLikeEventIds(target.id);

    if (likeIds.length > 0) {
      await this.publishAndIngest(
        publisher,
        buildDeletionTemplate(likeIds, REACTION_KIND, this.nowSeconds()),
      );
      return false;
    }

    await this.publishAndIngest(
      publisher,
      buildLikeTemplate(target, this.nowSeconds()),
    );
    return true;
  }

  /**
   * Repost `target`, or delete the existing repost
   * @returns Whether the target is reposted afterwards
   */
  async toggleRepost(target: TargetEvent): Promise<boolean> {
    const publisher = this.requirePublisher();
    const repostIds = this.getRepostEventIds(target.id, target.address);

    if (repostIds.length > 0) {
      const kind = target.kind === 1 ? REPOST_KIND : GENERIC_REPOST_KIND;
      await this.publishAndIngest(
        publisher,
        buildDeletionTemplate(repostIds, kind, this.nowSeconds()),
      );
      return false;
    }

    await this.publishAndIngest(
      publisher,
      buildRepostTemplate(target, this.nowSeconds()),
    );
    return true;
  }

  /**
   * @returns False when already following
   */
  async follow(pubkey: string): Promise<boolean> {
    const publisher = this.requirePublisher();
    const current = this.followingPubkeys;
    if (current.includes(pubkey)) return false;

    await this.publishContactList(publisher, [...current, pubkey]);
    return true;
  }

  /**
   * @returns False when not following
   */
  async unfollow(pubkey: string): Promise<boolean> {
    const publisher = this.requirePublisher();
    const current = this.followingPubkeys;
    if (!current.includes(pubkey)) return false;

    await this.publishContactList(
      publisher,
      current.filter((p) => p !== pubkey),
    );
    return true;
  }

  /**
   * Create a follow set and publish it
   */
  async createFollowSet(input: NewFollowSet): Promise<FollowSetPayload> {
    const publisher = this.requirePublisher();
    const identifier = input.identifier ?? `followset_${this.now()}`;
    if (this.getFollowSet(identifier)) {
      throw new SyncError(`Follow set ${identifier} already exists`);
    }

    const set: FollowSetPayload = {
      identifier,
      title: input.title,
      pubkeys: Array.from(new Set(input.pubkeys ?? [])),
    };
    if (input.description) set.description = input.description;
    if (input.image) set.image = input.image;

    await this.publishFollowSet(publisher, set);
    return set;
  }

  /**
   * @returns False when the set is unknown or already has `pubkey`
   */
  async addToFollowSet(identifier: string, pubkey: string): Promise<boolean> {
    const publisher = this.requirePublisher();
    const set = this.getFollowSet(identifier);
    if (!set || set.pubkeys.includes(pubkey)) return false;

    await this.publishFollowSet(publisher, {
      ...set,
      pubkeys: [...set.pubkeys, pubkey],
    });
    return true;
  }

  /**
   * @returns False when the set is unknown or lacks `pubkey`
   */
  async removeFromFollowSet(
    identifier: string,
    pubkey: string,
  ): Promise<boolean> {
    const publisher = this.requirePublisher();
    const set = this.getFollowSet(identifier);
    if (!set || !set.pubkeys.includes(pubkey)) return false;

    await this.publishFollowSet(publisher, {
      ...set,
      pubkeys: set.pubkeys.filter((p) => p !== pubkey),
    });
    return true;
  }

  /**
   * Replace the metadata fields present in `changes`
   * @returns False when the set is unknown
   */
  async updateFollowSet(
    identifier: string,
    changes: FollowSetChanges,
  ): Promise<boolean> {
    const publisher = this.requirePublisher();
    const set = this.getFollowSet(identifier);
    if (!set) return false;

    await this.publishFollowSet(publisher, {
      ...set,
      title: changes.title ?? set.title,
      description: changes.description ?? set.description,
      image: changes.image ?? set.image,
    });
    return true;
  }

  /**
   * Publish a deletion for the set's event id and coordinate
   * @returns False when the set is unknown
   */
  async deleteFollowSet(identifier: string): Promise<boolean> {
    const publisher = this.requirePublisher();
    const item = this.getFollowSetItem(identifier);
    if (!item) return false;

    await this.publishAndIngest(
      publisher,
      buildDeletionTemplate(
        [item.eventId],
        FOLLOW_SET_KIND,
        Math.max(this.nowSeconds(), item.createdAt),
        [item.key],
      ),
    );
    return true;
  }

  // --- Queries ---

  /**
   * Count "+" reactions to `eventId` with a one-shot query
   */
  async getLikeStatus(eventId: string): Promise<LikeStatus> {
    const likes = new Set<string>();

    await this.runQuery(
      `like_count_${shortKey(eventId)}`,
      [{ kinds: [REACTION_KIND], "#e": [eventId] }],
      LIKE_COUNT_TIMEOUT,
      (event) => {
        if (getLikeTarget(event)?.target === eventId) likes.add(event.id);
      },
    );

    return { count: likes.size, userLiked: this.isLiked(eventId) };
  }

  /**
   * Followers are distinct authors whose contact list names `pubkey`;
   * following is the size of `pubkey`'s newest contact list.
   */
  async getFollowerStats(pubkey: string): Promise<FollowerStats> {
    const followers = new Set<string>();
    let following = 0;
    let followingAt = -Infinity;

    await Promise.all([
      this.runQuery(
        `following_${shortKey(pubkey)}`,
        [{ kinds: [CONTACTS_KIND], authors: [pubkey], limit: 1 }],
        FOLLOWER_STATS_TIMEOUT,
        (event) => {
          if (event.pubkey !== pubkey || event.created_at <= followingAt) return;
          followingAt = event.created_at;
          following = getContactPubkeys(event)?.pubkeys.length ?? 0;
        },
      ),
      this.runQuery(
        `followers_${shortKey(pubkey)}`,
        [{ kinds: [CONTACTS_KIND], "#p": [pubkey] }],
        FOLLOWER_STATS_TIMEOUT,
        (event) => {
          if (getContactPubkeys(event)?.pubkeys.includes(pubkey)) {
            followers.add(event.pubkey);
          }
        },
      ),
    ]);

    return { followers: followers.size, following };
  }

  // --- Private ---

  private buildSubscriptions(
    pubkey: string,
    options: StartOptions,
  ): SocialSubscription[] {
    const authors = [pubkey];
    const curators = Array.from(new Set([pubkey, ...(options.curators ?? [])]));
    const name = (suffix: string) =>
      `${SOCIAL_SUBSCRIPTION_PREFIX}${suffix}_${shortKey(pubkey)}`;

    return [
      {
        name: name("contacts"),
        filters: [{ kinds: [CONTACTS_KIND], authors, limit: 1 }],
        priority: 2,
      },
      {
        name: name("reactions"),
        filters: [{ kinds: [REACTION_KIND], authors, limit: 500 }],
        priority: 3,
      },
      {
        name: name("reposts"),
        filters: [
          { kinds: [REPOST_KIND, GENERIC_REPOST_KIND], authors, limit: 500 },
        ],
        priority: 3,
      },
      {
        name: name("deletions"),
        filters: [{ kinds: [DELETION_KIND], authors, limit: 500 }],
        priority: 3,
      },
      {
        name: name("follow_sets"),
        filters: [{ kinds: [FOLLOW_SET_KIND], authors }],
        priority: 4,
      },
      {
        name: name("curation_sets"),
        filters: [{ kinds: [VIDEO_CURATION_SET_KIND], authors: curators }],
        priority: 5,
      },
    ];
  }

  private async ingestLive(event: NostrEvent): Promise<void> {
    try {
      await this.reconciler.ingest(event, "live");
    } catch (error) {
      logger.error(`Failed to reconcile event ${event.id}`, error);
      this.onError?.({
        source: "reconcile",
        error: toError(error),
        timestamp: this.now(),
      });
    }
  }

  /**
   * Run a one-shot managed subscription until it reaches a terminal status
   * (EOSE, timeout, eviction or error)
   */
  private runQuery(
    prefix: string,
    filters: Filter[],
    timeout: number,
    onEvent: (event: NostrEvent) => void,
  ): Promise<void> {
    const name = `${prefix}_${++this.querySequence}`;

    return new Promise<void>((resolve, reject) => {
      const done = this.manager.lifecycle$
        .pipe(
          filter((event) => event.name === name),
          take(1),
        )
        .subscribe({ complete: () => resolve() });

      this.manager
        .createSubscription({
          name,
          filters,
          onEvent,
          onError: (error) => logger.warn(`${name} failed`, error),
          timeout,
          priority: COUNT_QUERY_PRIORITY,
          closeOnEose: true,
          retry: false,
        })
        .catch((error: unknown) => {
          done.unsubscribe();
          reject(error);
        });
    });
  }

  private getFollowSetItem(
    identifier: string,
  ): ReconciledItem<FollowSetPayload> | undefined {
    if (!this.pubkey) return undefined;
    const key = buildAddress(FOLLOW_SET_KIND, this.pubkey, identifier);
    return this.bindings.followSets.collection.get(key);
  }

  private async publishFollowSet(
    publisher: SocialPublisher,
    set: FollowSetPayload,
  ): Promise<void> {
    // Must sort after the version it replaces even within the same second
    const previous = this.getFollowSetItem(set.identifier)?.createdAt ?? 0;
    const createdAt = Math.max(this.nowSeconds(), previous + 1);

    await this.publishAndIngest(publisher, buildFollowSetTemplate(set, createdAt));
  }

  private getLikeEventIds(eventId: string): string[] {
    return this.bindings.reactions.collection
      .values()
      .filter((item) => item.payload.target === eventId)
      .map((item) => item.eventId);
  }

  private getRepostEventIds(eventId: string, address?: string): string[] {
    return this.bindings.reposts.collection
      .values()
      .filter(
        (item) =>
          item.payload.target === eventId ||
          item.payload.eventId === eventId ||
          (address !== undefined && item.payload.target === address),
      )
      .map((item) => item.eventId);
  }

  private getContactList(): ReconciledItem<ContactListPayload> | undefined {
    if (!this.pubkey) return undefined;
    const key = buildAddress(CONTACTS_KIND, this.pubkey);
    return this.bindings.contacts.collection.get(key);
  }

  private async publishContactList(
    publisher: SocialPublisher,
    pubkeys: string[],
  ): Promise<void> {
    // Must sort after the list it replaces even within the same second
    const previous = this.getContactList()?.createdAt ?? 0;
    const createdAt = Math.max(this.nowSeconds(), previous + 1);

    await this.publishAndIngest(
      publisher,
      buildContactListTemplate(pubkeys, createdAt),
    );
  }

  private requirePublisher(): SocialPublisher {
    if (!this.pubkey) {
      throw new NotAuthenticatedError("Social state has not been started");
    }
    if (!this.publisher) {
      throw new NotAuthenticatedError("No signer configured");
    }
    return this.publisher;
  }

  private async publishAndIngest(
    publisher: SocialPublisher,
    template: EventTemplate,
  ): Promise<NostrEvent> {
    let event: NostrEvent;
    try {
      event = await publisher.signEvent(template);
      await publisher.publish(event);
    } catch (error) {
      if (error instanceof PublishError) throw error;
      throw new PublishError(
        `Failed to publish kind ${template.kind} event`,
        error,
      );
    }

    await this.reconciler.ingest(event, "local");
    return event;
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}
