/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Pagination Schemas
// ============================================================================

export const PaginationQuerySchema = Type.Object({
  limit: Type.Optional(Type.Number({ minimum: 1, maximum: 500, default: 50 })),
  cursor: Type.Optional(Type.String()),
});

export type PaginationQuery = Static<typeof PaginationQuerySchema>;

export const PaginationMetaSchema = Type.Object({
  cursor: Type.Union([Type.String(), Type.Null()]),
  hasMore: Type.Boolean(),
  limit: Type.Number(),
  total: Type.Optional(Type.Number()),
});

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

export type ApiErrorType = Static<typeof ApiErrorSchema>;

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
  });
}

export function createListResponseSchema<T extends TSchema>(itemSchema: T) {
  return Type.Object({
    data: Type.Array(itemSchema),
    meta: Type.Object({
      pagination: PaginationMetaSchema,
    }),
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const NullableString = Type.Union([Type.String(), Type.Null()]);

export const NullableNumber = Type.Union([Type.Number(), Type.Null()]);

export const SyncRunStatusSchema = Type.Union([
  Type.Literal("RUNNING"),
  Type.Literal("COMPLETED"),
  Type.Literal("FAILED"),
]);
