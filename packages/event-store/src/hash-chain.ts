/**
 * @redpacket/event-store: Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * chained through its predecessor's hash:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
} from "./types.js";
import { isDomainEvent } from "@redpacket/types";
import { isHashedEvent } from "./types.js";

/** `previousHash` of the first event in the chain. */
export const GENESIS_HASH = "genesis";

function canonicalEventContent(event: StoredEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Hex-encoded SHA-256 of an event given its predecessor's hash.
 */
export function computeEventHash(
  event: StoredEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Verify the hash chain of events given in global position order.
 *
 * The first event must link to GENESIS_HASH; every later event must
 * link to its predecessor and hash to its recorded value. Event content
 * read back from the store must still be a well-formed domain event.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const event of events) {
    if (!isHashedEvent(event)) {
      errors.push({
        position: event.globalPosition,
        reason: `Event at position ${event.globalPosition} is missing hash fields`,
      });
      continue;
    }

    if (!isDomainEvent(event.event)) {
      errors.push({
        position: event.globalPosition,
        reason: `Event at position ${event.globalPosition} is not a well-formed domain event`,
      });
    }

    if (event.previousHash !== previousHash) {
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${event.globalPosition}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${event.globalPosition}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    previousHash = event.hash;
    lastVerifiedPosition = event.globalPosition;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
