/**
 * @redpacket/event-store: In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for tests, embedding and
 * single-process nodes; all state is lost on process exit.
 *
 * - O(1) append (amortized)
 * - O(n) read (n = events returned)
 * - Synchronous subscription dispatch; a throwing subscriber is logged
 *   and skipped, never surfaced to the appender
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { DomainEvent } from "@redpacket/types";
import { isDomainEvent } from "@redpacket/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

/**
 * In-memory event store.
 *
 * Events are kept twice: per stream for stream reads, and in one
 * global log for readAll and global subscriptions.
 */
export interface InMemoryEventStoreOptions {
  /** Receives subscriber failures. Default: silent */
  readonly logger?: Logger | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, HashedStoredEvent[]>();
  private readonly _globalLog: HashedStoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private _nextGlobalPosition = 1;
  private _lastHash: string = GENESIS_HASH;
  private readonly _logger: Logger;

  constructor(options?: InMemoryEventStoreOptions) {
    this._logger = options?.logger ?? pino({ level: "silent" });
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    events.forEach((event, i) => {
      if (!isDomainEvent(event)) {
        throw new EventStoreError(
          "INVALID_EVENT",
          `Event ${i} appended to "${streamId}" is not a well-formed domain event`,
          streamId,
        );
      }
    });

    const existing = this._streams.get(streamId);
    const currentVersion = existing?.length ?? 0;
    this._checkExpectedVersion(streamId, currentVersion, options);

    const stream = existing ?? [];
    const fromVersion = currentVersion + 1;
    const appendedAt = new Date().toISOString();
    const stored: HashedStoredEvent[] = [];

    events.forEach((event, i) => {
      const base: StoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._nextGlobalPosition++,
        appendedAt,
      };

      const previousHash = this._lastHash;
      const hashed: HashedStoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = hashed.hash;

      stream.push(hashed);
      this._globalLog.push(hashed);
      stored.push(hashed);
    });

    this._streams.set(streamId, stream);
    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      (options?.direction ?? "forward") === "forward"
        ? stream.filter((e) => e.version >= fromVersion)
        : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    const result =
      (options?.direction ?? "forward") === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
        : this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse();

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    subscribers.add(handler);
    const owned = subscribers;

    return {
      unsubscribe: () => {
        owned.delete(handler);
        if (owned.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  /**
   * Verify the hash chain over every stored event.
   */
  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    options?: AppendOptions,
  ): void {
    const expected = options?.expectedVersion;
    if (expected === undefined || expected === "any") {
      return;
    }

    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
          streamId,
        );
      }
      return;
    }

    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    for (const event of events) {
      if (streamSubs !== undefined) {
        for (const handler of streamSubs) this._notify(handler, event);
      }
      for (const handler of this._globalSubscribers) this._notify(handler, event);
    }
  }

  // Runs after the append is stored: failures are logged, not rethrown.
  private _notify(handler: EventHandler, event: StoredEvent): void {
    try {
      handler(event);
    } catch (err) {
      this._logger.error(
        { err, streamId: event.streamId, version: event.version, type: event.event.type },
        "event subscriber failed",
      );
    }
  }
}

function limit<T>(events: T[], maxCount: number | undefined): T[] {
  if (maxCount !== undefined && maxCount >= 0) {
    return events.slice(0, maxCount);
  }
  return events;
}
