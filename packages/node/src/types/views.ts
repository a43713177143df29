/**
 * JSON views of domain values.
 *
 * Balances are bigint in the domain and base-10 strings on the wire.
 */

import { formatBalance } from "@redpacket/ledger";
import type { RedPacketEvent } from "@redpacket/packets";
import type { Balance, Packet } from "@redpacket/types";
import type { AccountView, PacketView } from "../services/redpacket-service.js";

export interface PacketJson {
  readonly id: number;
  readonly total: string;
  readonly unclaimed: string;
  readonly quota: string;
  readonly count: number;
  readonly expiresAt: number;
  readonly owner: string;
  readonly distributed: boolean;
}

export function toPacketJson(packet: Packet, quota: Balance): PacketJson {
  return {
    id: packet.id,
    total: formatBalance(packet.total),
    unclaimed: formatBalance(packet.unclaimed),
    quota: formatBalance(quota),
    count: packet.count,
    expiresAt: packet.expiresAt,
    owner: packet.owner,
    distributed: packet.distributed,
  };
}

export function toPacketViewJson(view: PacketView) {
  return {
    packet: toPacketJson(view.packet, view.quota),
    claims: view.claims,
    status: view.status,
  };
}

export function toAccountJson(view: AccountView) {
  return {
    account: view.account,
    free: formatBalance(view.free),
    reserved: formatBalance(view.reserved),
  };
}

export function toEventJson(event: RedPacketEvent) {
  switch (event.type) {
    case "redpacket.packet.created":
      return { ...event, total: formatBalance(event.total) };
    case "redpacket.packet.claimed":
      return { ...event, quota: formatBalance(event.quota) };
    case "redpacket.packet.distributed":
      return { ...event, totalTransferred: formatBalance(event.totalTransferred) };
  }
}
