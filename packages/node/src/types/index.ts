/**
 * Type barrel: re-exports all public types from @redpacket/node.
 */

// DTOs
export {
  AmountSchema,
  CursorSchema,
  PaginationQuerySchema,
  CreatePacketSchema,
  PacketIdParamSchema,
  ListEventsQuerySchema,
  PacketEventsQuerySchema,
} from "./dto.js";
export type { CreatePacketDto, ListEventsQuery, PacketEventsQuery } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, pageOf } from "./pagination.js";
export type { EventOrder, Page, PageCursor, PageRequest } from "./pagination.js";

// Views
export { toPacketJson, toPacketViewJson, toAccountJson, toEventJson } from "./views.js";
export type { PacketJson } from "./views.js";

// Auth
export type { ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
