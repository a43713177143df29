/**
 * @redpacket/event-store: Core types.
 *
 * Append-only persistence for the events the packet module emits.
 *
 * - Events are immutable after append
 * - Every packet has its own stream (`packet-<id>`)
 * - Versions are contiguous within a stream, global positions across streams
 * - Every stored event is linked into a SHA-256 hash chain
 */

import type { DomainEvent, EventMetadata } from "@redpacket/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 */
export interface StoredEvent<TPayload = Record<string, unknown>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;

  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * A stored event linked into the store's hash chain.
 */
export interface HashedStoredEvent<TPayload = Record<string, unknown>>
  extends StoredEvent<TPayload> {
  /** SHA-256 of this event's canonical content plus previousHash */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH */
  readonly previousHash: string;
}

/**
 * Narrow a stored event to one carrying hash chain fields.
 */
export function isHashedEvent(event: StoredEvent): event is HashedStoredEvent {
  return (
    "hash" in event &&
    typeof event.hash === "string" &&
    "previousHash" in event &&
    typeof event.previousHash === "string"
  );
}

// =============================================================================
// Append / Read Options
// =============================================================================

/**
 * Expected stream version for optimistic concurrency control.
 *
 * - A number: the stream must be at exactly this version
 * - "no_stream": the stream must not exist yet
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  /** Version of the first appended event */
  readonly fromVersion: number;
  /** Version of the last appended event (the new stream head) */
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** First version to read (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;
  /** Default: unlimited */
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** First global position to read (inclusive). Default: 1 */
  readonly fromPosition?: number;
  /** Default: unlimited */
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Called synchronously for each appended event.
 */
export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...)
 * - Global positions increase by one per event
 * - Subscribers see events in append order
 */
export interface EventStore {
  /**
   * Append events to a stream.
   *
   * @throws EventStoreError if the concurrency check fails
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Read one stream; empty if the stream does not exist. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Read every stream in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the stream head, or 0 if the stream doesn't exist. */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty. */
  globalPosition(): number;

  /** Re-verify the hash chain over every stored event. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Integrity
// =============================================================================

/**
 * A single break in the hash chain.
 */
export interface IntegrityError {
  /** Global position of the offending event */
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event that was checked */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "INVALID_EVENT";

/**
 * Error thrown by EventStore operations.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
