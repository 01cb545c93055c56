// =============================================================================
// FakeTrace - Ledger Runtime (Serialized Log-Then-Execute)
// =============================================================================

import {
  GENESIS_DIGEST,
  type TrackingLedger,
  compositeKey,
  createTrackingLedger,
  sealEntry,
  verifyLogChain,
} from "@faketrace/ledger-core"
import type {
  ExecutionOutcome,
  LedgerCall,
  LedgerGenesis,
  LogEntry,
} from "@faketrace/shared-types"
import { createLogger } from "./logger.js"
import type { LogStore } from "./logStore.js"

const log = createLogger("runtime")

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface SubmitInput {
  caller: string
  request_id: string | null
  call: LedgerCall
}

export interface SubmitResult {
  entry: LogEntry
  outcome: ExecutionOutcome
  /** True when the request id was already in the log and nothing new was executed. */
  replayed: boolean
}

export interface ReplaySummary {
  entries: number
  failed: number
  head: string
}

export interface LedgerRuntime {
  readonly ledger: TrackingLedger
  start(): Promise<ReplaySummary>
  submit(input: SubmitInput): Promise<SubmitResult>
  head(): { sequence: number; digest: string }
}

export interface LedgerRuntimeOptions {
  store: LogStore
  genesis: LedgerGenesis
  /** Wall clock in unix seconds */
  clock?: () => number
}

export function systemClock(): number {
  return Math.floor(Date.now() / 1000)
}

// -----------------------------------------------------------------------------
// Genesis
// -----------------------------------------------------------------------------

/**
 * Returns the stored genesis, recording one for `owner` on first start. A
 * stored owner always wins over configuration.
 */
export async function resolveGenesis(
  store: LogStore,
  owner: string,
  clock: () => number = systemClock
): Promise<LedgerGenesis> {
  const stored = await store.loadGenesis()
  if (stored) {
    if (stored.owner !== owner) {
      log.warn(
        { configured: owner, stored: stored.owner },
        "Configured owner differs from the recorded genesis; using the recorded owner"
      )
    }
    return stored
  }

  const genesis: LedgerGenesis = { owner, timestamp: clock() }
  await store.saveGenesis(genesis)
  log.info({ owner }, "Recorded ledger genesis")
  return genesis
}

// -----------------------------------------------------------------------------
// Create Runtime
// -----------------------------------------------------------------------------

export function createLedgerRuntime(options: LedgerRuntimeOptions): LedgerRuntime {
  const { store, genesis } = options
  const clock = options.clock ?? systemClock
  const ledger = createTrackingLedger(genesis)

  // Keyed by compositeKey(caller, request_id)
  const completed = new Map<string, { entry: LogEntry; outcome: ExecutionOutcome }>()
  let headDigest = GENESIS_DIGEST
  let started = false
  let chain: Promise<void> = Promise.resolve()

  function remember(entry: LogEntry, outcome: ExecutionOutcome): void {
    if (entry.request_id !== null) {
      completed.set(compositeKey(entry.caller, entry.request_id), { entry, outcome })
    }
  }

  async function start(): Promise<ReplaySummary> {
    if (started) throw new Error("Ledger runtime already started")

    const entries = await store.readAll()
    const verification = verifyLogChain(entries)
    if (!verification.valid) {
      throw new Error(
        `Ledger log is corrupt at sequence ${verification.broken_at}: ${verification.reason}`
      )
    }

    let failed = 0
    for (const entry of entries) {
      const outcome = ledger.execute(entry)
      if (!outcome.ok) failed++
      remember(entry, outcome)
    }

    headDigest = verification.head
    started = true
    log.info({ entries: entries.length, failed, head: headDigest }, "Ledger state replayed")
    return { entries: entries.length, failed, head: headDigest }
  }

  async function execute(input: SubmitInput): Promise<SubmitResult> {
    if (input.request_id !== null) {
      const previous = completed.get(compositeKey(input.caller, input.request_id))
      if (previous) {
        log.debug({ requestId: input.request_id, sequence: previous.entry.sequence }, "Duplicate request")
        return { ...previous, replayed: true }
      }
    }

    // The log clock never runs backwards, even if the wall clock does
    const timestamp = Math.max(ledger.lastTimestamp(), clock())
    const entry = sealEntry(
      {
        sequence: ledger.lastSequence() + 1,
        timestamp,
        caller: input.caller,
        request_id: input.request_id,
        call: input.call,
      },
      headDigest
    )

    await store.append(entry)
    headDigest = entry.digest
    const outcome = ledger.execute(entry)
    remember(entry, outcome)

    if (outcome.ok) {
      log.info({ sequence: entry.sequence, method: outcome.method, caller: entry.caller }, "Call executed")
    } else {
      log.warn(
        { sequence: entry.sequence, method: outcome.method, caller: entry.caller, code: outcome.error.code },
        "Call rejected"
      )
    }
    return { entry, outcome, replayed: false }
  }

  function submit(input: SubmitInput): Promise<SubmitResult> {
    if (!started) {
      return Promise.reject(new Error("Ledger runtime not started"))
    }
    // One call at a time: each waits for the previous append and execution
    const run = chain.then(() => execute(input))
    chain = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  return {
    ledger,
    start,
    submit,
    head: () => ({ sequence: ledger.lastSequence(), digest: headDigest }),
  }
}
