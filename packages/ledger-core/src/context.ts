// =============================================================================
// Call Context & Shared Guards
// =============================================================================

import {
  MAX_BASIS_POINTS,
  MAX_PAGE_LIMIT,
  type LedgerEventPayloads,
  type LedgerEventType,
  type Page,
} from "@faketrace/shared-types"
import { LedgerError } from "./errors.js"
import { isZeroHash } from "./hasher.js"

// -----------------------------------------------------------------------------
// Call Context
// -----------------------------------------------------------------------------

export type EventSink = <K extends LedgerEventType>(type: K, data: LedgerEventPayloads[K]) => void

/**
 * Everything an operation may know about the call it is executing: who sent
 * it, the log timestamp it executes at, and where to put its events.
 * Events pushed to `emit` are only published if the whole call succeeds.
 */
export interface CallContext {
  caller: string
  now: number
  emit: EventSink
}

// -----------------------------------------------------------------------------
// Guards
// -----------------------------------------------------------------------------

export function requireNonZeroHash(hash: string, field = "content_hash"): void {
  if (isZeroHash(hash)) {
    throw new LedgerError("ZeroHash", `${field} must not be the zero hash`, { field })
  }
}

export function isBasisPoints(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_BASIS_POINTS
}

export function requireBasisPoints(value: number, field: string): void {
  if (!isBasisPoints(value)) {
    throw new LedgerError("ScoreOutOfRange", `${field} must be an integer in [0, ${MAX_BASIS_POINTS}]`, {
      field,
      value,
    })
  }
}

// -----------------------------------------------------------------------------
// Pagination
// -----------------------------------------------------------------------------

export function paginate<T>(items: readonly T[], offset: number, limit: number): Page<T> {
  const start = Math.max(0, Math.floor(offset))
  const size = Math.min(MAX_PAGE_LIMIT, Math.max(1, Math.floor(limit)))
  return {
    items: items.slice(start, start + size),
    total: items.length,
    offset: start,
    limit: size,
  }
}

/** Basis points rendered as a percentage with two decimals, without floating point. */
export function formatBasisPoints(bp: number): string {
  const whole = Math.floor(bp / 100)
  const fraction = String(bp % 100).padStart(2, "0")
  return `${whole}.${fraction}%`
}
