/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Pagination Schemas
// ============================================================================

export const PaginationMetaSchema = Type.Object({
  limit: Type.Number(),
  offset: Type.Number(),
  hasMore: Type.Boolean(),
  nextOffset: Type.Union([Type.Number(), Type.Null()]),
});

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
    meta: Type.Optional(
      Type.Object({
        pagination: Type.Optional(PaginationMetaSchema),
      })
    ),
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const NullableString = Type.Union([Type.String(), Type.Null()]);
export const NullableNumber = Type.Union([Type.Number(), Type.Null()]);
export const NullableBoolean = Type.Union([Type.Boolean(), Type.Null()]);

export const BracketSchema = Type.Union([
  Type.Literal("men"),
  Type.Literal("women"),
]);

export const TaskKindSchema = Type.Union([
  Type.Literal("organizations"),
  Type.Literal("profiles-all"),
  Type.Literal("competitions"),
]);

export const TaskStatusSchema = Type.Union([
  Type.Literal("running"),
  Type.Literal("success"),
  Type.Literal("failed"),
  Type.Literal("cancelled"),
]);

export const TaskTriggerSchema = Type.Union([
  Type.Literal("manual"),
  Type.Literal("scheduled"),
]);

// ============================================================================
// ID Parameter Schemas
// ============================================================================

export const IdParamSchema = Type.Object({
  id: Type.String(),
});

export type IdParam = Static<typeof IdParamSchema>;

export const CodeParamSchema = Type.Object({
  code: Type.String(),
});

export type CodeParam = Static<typeof CodeParamSchema>;

export const LicenceParamSchema = Type.Object({
  licence: Type.String(),
});

export type LicenceParam = Static<typeof LicenceParamSchema>;
