/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Range checks on quota, count and expires belong to the packet module,
 * so these schemas only check shape.
 */

import { z } from "zod";
import { decodeCursor } from "./pagination.js";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Base-10 integer string */
export const AmountSchema = z.string().regex(/^\d+$/, "must be a base-10 integer string");

/** Cursor token from a previous page, decoded */
export const CursorSchema = z.string().transform((token, ctx) => {
  const cursor = decodeCursor(token);
  if (cursor === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "is not a page cursor" });
    return z.NEVER;
  }
  return cursor;
});

export const PaginationQuerySchema = z.object({
  cursor: CursorSchema.optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Packet DTOs
// =============================================================================

export const CreatePacketSchema = z.object({
  quota: AmountSchema,
  count: z.number().int(),
  expires: z.number().int(),
});

export type CreatePacketDto = z.infer<typeof CreatePacketSchema>;

export const PacketIdParamSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer")
  .transform(Number);

// =============================================================================
// Event Queries
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const PacketEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type PacketEventsQuery = z.infer<typeof PacketEventsQuerySchema>;
