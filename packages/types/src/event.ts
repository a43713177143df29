/**
 * Event Types
 *
 * Every committed packet operation is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, at which block)
 * - Payloads are JSON values; amounts travel as decimal strings
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Account or subsystem that caused this event */
  readonly actor: string;

  /** ID for grouping related events (the packet stream) */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "redpacket" | "ledger" | "node";

  /** Block height the event was emitted at */
  readonly blockNumber?: number;
}

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "redpacket.packet.created") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
