/**
 * Caller authentication.
 *
 * An origin is whoever dispatched an operation. Only signed origins
 * carry an account; every packet operation requires one.
 */

import type { AccountId } from "@redpacket/types";
import { RedPacketError } from "./types.js";

export type Origin =
  | { readonly kind: "signed"; readonly account: AccountId }
  | { readonly kind: "root" }
  | { readonly kind: "none" };

export const ROOT_ORIGIN: Origin = { kind: "root" };
export const NONE_ORIGIN: Origin = { kind: "none" };

export function signed(account: AccountId): Origin {
  return { kind: "signed", account };
}

/**
 * Return the signing account.
 *
 * @throws RedPacketError BAD_ORIGIN for root, none, or an empty account
 */
export function ensureSigned(origin: Origin): AccountId {
  if (origin.kind !== "signed") {
    throw new RedPacketError("BAD_ORIGIN", `Expected a signed origin, got ${origin.kind}`);
  }
  if (origin.account.length === 0) {
    throw new RedPacketError("BAD_ORIGIN", "Signed origin has an empty account id");
  }
  return origin.account;
}
