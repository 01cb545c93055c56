// =============================================================================
// Canonical Hashing for Ledger Keys and Log Entries
// =============================================================================

import { createHash } from "node:crypto"
import { ZERO_ADDRESS, ZERO_HASH } from "@faketrace/shared-types"

// -----------------------------------------------------------------------------
// Canonical Content Generation
// -----------------------------------------------------------------------------

/**
 * Creates a canonical string representation of any value for hashing.
 * Object keys are sorted so equal values always hash the same.
 */
export function canonicalize(value: unknown): string {
  if (value === null) return "null"
  if (value === undefined) return "undefined"

  if (typeof value === "boolean") return value.toString()
  if (typeof value === "number") return value.toString()
  if (typeof value === "string") return JSON.stringify(value)

  if (Array.isArray(value)) {
    const items = value.map((v) => canonicalize(v))
    return `[${items.join(",")}]`
  }

  if (typeof value === "object") {
    const pairs = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]: [string, unknown]) => `${JSON.stringify(key)}:${canonicalize(entry)}`)
    return `{${pairs.join(",")}}`
  }

  return String(value)
}

// -----------------------------------------------------------------------------
// SHA-256 Hashing
// -----------------------------------------------------------------------------

export function sha256(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex")
}

export function computeCanonicalHash(value: unknown): string {
  return sha256(canonicalize(value))
}

/** SHA-256 of a UTF-8 string as a 0x-prefixed 32-byte key. */
export function toBytes32(input: string): string {
  return `0x${sha256(input)}`
}

// -----------------------------------------------------------------------------
// Ledger Keys
// -----------------------------------------------------------------------------

export function isZeroHash(hash: string): boolean {
  return hash === "" || hash.toLowerCase() === ZERO_HASH
}

export function isZeroAddress(address: string): boolean {
  return address === "" || address.toLowerCase() === ZERO_ADDRESS
}

/**
 * Country names are keyed by their digest, so "US" and "us" are different
 * countries. Callers are expected to send resolver output verbatim.
 */
export function countryKey(country: string): string {
  return toBytes32(country)
}

/** Flattened key for (contentHash, secondaryKey) counters. */
export function compositeKey(contentHash: string, secondary: string): string {
  return `${contentHash}:${secondary}`
}

// -----------------------------------------------------------------------------
// Call Signing
// -----------------------------------------------------------------------------

/**
 * Message a node signs for each submitted call. Binds the canonical call and
 * its request id, so a signature cannot be replayed onto a different call.
 */
export function callSigningMessage(call: unknown, requestId: string | null): string {
  return `FakeTrace ledger call\n${computeCanonicalHash({ call, request_id: requestId })}`
}
