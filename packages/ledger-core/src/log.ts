// =============================================================================
// Append-Only Call Log - Digest Chain
// =============================================================================

import type { LedgerCall, LogEntry } from "@faketrace/shared-types"
import { canonicalize, sha256 } from "./hasher.js"

export const GENESIS_DIGEST = "0".repeat(64)

export interface LogEntryDraft {
  sequence: number
  timestamp: number
  caller: string
  request_id: string | null
  call: LedgerCall
}

// -----------------------------------------------------------------------------
// Sealing
// -----------------------------------------------------------------------------

export function computeEntryDigest(draft: LogEntryDraft, prevDigest: string): string {
  const body = canonicalize({
    sequence: draft.sequence,
    timestamp: draft.timestamp,
    caller: draft.caller,
    request_id: draft.request_id,
    call: draft.call,
  })
  return sha256(prevDigest + body)
}

export function sealEntry(draft: LogEntryDraft, prevDigest: string): LogEntry {
  return {
    ...draft,
    prev_digest: prevDigest,
    digest: computeEntryDigest(draft, prevDigest),
  }
}

// -----------------------------------------------------------------------------
// Verification
// -----------------------------------------------------------------------------

export type ChainVerification =
  | { valid: true; length: number; head: string }
  | { valid: false; broken_at: number; reason: string }

export function verifyLogChain(entries: readonly LogEntry[]): ChainVerification {
  let prevDigest = GENESIS_DIGEST
  let prevTimestamp = 0

  for (const [index, entry] of entries.entries()) {
    if (entry.sequence !== index + 1) {
      return { valid: false, broken_at: entry.sequence, reason: `expected sequence ${index + 1}` }
    }
    if (entry.prev_digest !== prevDigest) {
      return { valid: false, broken_at: entry.sequence, reason: "prev_digest does not match previous entry" }
    }
    if (entry.timestamp < prevTimestamp) {
      return { valid: false, broken_at: entry.sequence, reason: "timestamp went backwards" }
    }
    if (computeEntryDigest(entry, prevDigest) !== entry.digest) {
      return { valid: false, broken_at: entry.sequence, reason: "digest mismatch" }
    }
    prevDigest = entry.digest
    prevTimestamp = entry.timestamp
  }

  return { valid: true, length: entries.length, head: prevDigest }
}
