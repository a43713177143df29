/**
 * @redpacket/event-store: Event Catalog.
 *
 * A registry of known event types with their payload validators.
 * Used to check events before they are appended and to list what a
 * stream may contain.
 */

import type { DomainEvent, EventMetadata } from "@redpacket/types";

/**
 * Defines one event type.
 */
export interface EventSchema {
  /** Event type string (e.g., "redpacket.packet.created") */
  readonly type: string;

  /** Schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventMetadata["source"];

  /** Returns true if the payload matches this schema. */
  validate(payload: unknown): boolean;
}

/**
 * Centralized registry of event types.
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   * Re-registering the same version is a no-op; a higher version replaces it.
   *
   * @throws CatalogError when downgrading an already registered type
   */
  register(schema: EventSchema): void {
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version > schema.version) {
      throw new CatalogError(
        `Cannot downgrade "${schema.type}" from version ${existing.version} to ${schema.version}`,
      );
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventMetadata["source"]): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate a payload against its registered schema.
   * Unregistered types are invalid.
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  /**
   * Assert an event is registered and its payload valid.
   *
   * @throws CatalogError otherwise
   */
  assertValid(event: DomainEvent): void {
    if (!this.has(event.type)) {
      throw new CatalogError(`Unknown event type "${event.type}"`);
    }
    if (!this.validate(event.type, event.payload)) {
      throw new CatalogError(`Invalid payload for "${event.type}"`);
    }
  }

  get size(): number {
    return this._schemas.size;
  }
}

/**
 * Error thrown by catalog operations.
 */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
