// =============================================================================
// FakeTrace - Ledger Error Taxonomy
// =============================================================================

import { z } from "zod"

export const LedgerErrorCodeSchema = z.enum([
  // authorization
  "NotAuthorized",
  "NotOwner",
  // validation
  "ZeroHash",
  "ZeroChildHash",
  "ZeroAddress",
  "ScoreOutOfRange",
  "LengthMismatch",
  "BatchTooLarge",
  "SelfReference",
  "InvalidId",
  "InvalidRule",
  "InvalidCooldown",
  // state conflict
  "AlreadyAuthorized",
  "AlreadyAcknowledged",
  "AlreadyRegistered",
  "CannotDeauthorizeOwner",
  "NotFound",
])
export type LedgerErrorCode = z.infer<typeof LedgerErrorCodeSchema>

export const LedgerErrorCategorySchema = z.enum(["authorization", "validation", "state_conflict"])
export type LedgerErrorCategory = z.infer<typeof LedgerErrorCategorySchema>

export const LEDGER_ERROR_CATEGORY: Record<LedgerErrorCode, LedgerErrorCategory> = {
  NotAuthorized: "authorization",
  NotOwner: "authorization",
  ZeroHash: "validation",
  ZeroChildHash: "validation",
  ZeroAddress: "validation",
  ScoreOutOfRange: "validation",
  LengthMismatch: "validation",
  BatchTooLarge: "validation",
  SelfReference: "validation",
  InvalidId: "validation",
  InvalidRule: "validation",
  InvalidCooldown: "validation",
  AlreadyAuthorized: "state_conflict",
  AlreadyAcknowledged: "state_conflict",
  AlreadyRegistered: "state_conflict",
  CannotDeauthorizeOwner: "state_conflict",
  NotFound: "state_conflict",
}

/** Conflicts that mean the requested transition already happened. */
export const ALREADY_DONE_CODES: ReadonlySet<LedgerErrorCode> = new Set([
  "AlreadyAuthorized",
  "AlreadyAcknowledged",
  "AlreadyRegistered",
])

export const LedgerErrorInfoSchema = z.object({
  code: LedgerErrorCodeSchema,
  category: LedgerErrorCategorySchema,
  message: z.string(),
})
export type LedgerErrorInfo = z.infer<typeof LedgerErrorInfoSchema>
