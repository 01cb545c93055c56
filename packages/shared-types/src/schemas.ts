// =============================================================================
// FakeTrace - Core Zod Schemas
// =============================================================================

import { z } from "zod"

// -----------------------------------------------------------------------------
// Base Types
// -----------------------------------------------------------------------------

/** 32-byte digest, 0x-prefixed. Normalized to lowercase so it can be used as a map key. */
export const Bytes32Schema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, "expected a 0x-prefixed 32-byte hex digest")
  .transform((value) => value.toLowerCase())

/** 20-byte wallet address, 0x-prefixed, lowercase. */
export const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "expected a 0x-prefixed 20-byte address")
  .transform((value) => value.toLowerCase())

/** Unix time in whole seconds. */
export const UnixSecondsSchema = z.number().int().nonnegative()

/**
 * Basis points travel as plain integers. The [0, 10000] bound is enforced by
 * the ledger itself so that callers get a ScoreOutOfRange error, not a parse error.
 */
export const BasisPointsSchema = z.number().int()

/** Degrees scaled by 1e6. */
export const LatitudeSchema = z.number().int().min(-90_000_000).max(90_000_000)
export const LongitudeSchema = z.number().int().min(-180_000_000).max(180_000_000)

export const ShortTextSchema = z.string().max(256)
export const MetadataSchema = z.string().max(16_384)

export const MAX_PAGE_LIMIT = 100

/** Out-of-range limits are clamped, not rejected. */
export const PageRequestSchema = z.object({
  offset: z.coerce.number().int().nonnegative().default(0),
  limit: z.coerce
    .number()
    .int()
    .default(25)
    .transform((value) => Math.min(MAX_PAGE_LIMIT, Math.max(1, value))),
})
export type PageRequest = z.infer<typeof PageRequestSchema>

export interface Page<T> {
  items: T[]
  total: number
  offset: number
  limit: number
}

export const ZERO_HASH = `0x${"0".repeat(64)}`
export const ZERO_ADDRESS = `0x${"0".repeat(40)}`
export const MAX_BASIS_POINTS = 10_000
export const COORDINATE_SCALE = 1_000_000
