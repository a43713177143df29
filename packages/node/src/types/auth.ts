/**
 * Authentication types.
 *
 * API keys map one-to-one onto ledger accounts. The account behind the
 * key signs every packet operation of the request.
 */

import type { AccountId } from "@redpacket/types";

export interface ApiKeyRecord {
  readonly key: string;
  readonly account: AccountId;
}
