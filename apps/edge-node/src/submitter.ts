// =============================================================================
// FakeTrace - Outbox Submitter
// =============================================================================

import type { LedgerCall } from "@faketrace/shared-types"
import { type RegisterCall, deriveFollowUps, isRegisterCall, splitBatchResult, toBatchCall } from "./followups.js"
import type { DeliveryResult, LedgerClient } from "./ledgerClient.js"
import { createLogger } from "./logger.js"
import type { Outbox, OutboxItem } from "./outbox.js"
import { type RetryConfig, computeBackoff } from "./retry.js"

const log = createLogger("submitter")

// Follow-ups of follow-ups do not exist, so a third round is never needed
const MAX_ROUNDS = 3

// Past maxAttempts, a stalled call is logged as a warning once every this many attempts
const STALLED_LOG_EVERY = 10

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface FlushReport {
  attempted: number
  delivered: number
  rescheduled: number
  failed: number
  follow_ups: number
  /** Delivery outcome per outbox item id attempted in this flush. */
  outcomes: Map<string, DeliveryResult>
}

export interface SubmitterOptions {
  outbox: Outbox
  client: LedgerClient
  batchSize: number
  retry: RetryConfig
  /** Wall clock in milliseconds */
  clock?: () => number
  random?: () => number
}

export interface Submitter {
  /** Sends every due entry. Concurrent calls run one after another. */
  flush(): Promise<FlushReport>
}

type Group = { kind: "single"; item: OutboxItem } | { kind: "batch"; key: string; items: OutboxItem[] }

function emptyReport(): FlushReport {
  return { attempted: 0, delivered: 0, rescheduled: 0, failed: 0, follow_ups: 0, outcomes: new Map() }
}

// -----------------------------------------------------------------------------
// Create Submitter
// -----------------------------------------------------------------------------

export function createSubmitter(options: SubmitterOptions): Submitter {
  const { outbox, client, retry } = options
  const clock = options.clock ?? Date.now
  const random = options.random ?? Math.random
  const batchSize = Math.min(50, Math.max(1, options.batchSize))
  let chain: Promise<unknown> = Promise.resolve()

  /** Registrations are coalesced; batches that were already sent keep their members. */
  function planGroups(due: OutboxItem[]): Group[] {
    const groups: Group[] = []
    const existingBatches = new Map<string, OutboxItem[]>()
    let fresh: OutboxItem[] = []

    const closeFresh = () => {
      if (fresh.length === 1 && fresh[0]) {
        groups.push({ kind: "single", item: fresh[0] })
      } else if (fresh.length > 1) {
        groups.push({ kind: "batch", key: `batch-${fresh[0]?.id ?? ""}`, items: fresh })
      }
      fresh = []
    }

    for (const item of due) {
      if (!isRegisterCall(item.call) || item.solo) continue
      if (item.batch_key !== null) {
        const members = existingBatches.get(item.batch_key)
        if (members) members.push(item)
        else existingBatches.set(item.batch_key, [item])
        continue
      }
      fresh.push(item)
      if (fresh.length === batchSize) closeFresh()
    }
    closeFresh()

    const batches: Group[] = [...existingBatches].map(([key, items]): Group => ({ kind: "batch", key, items }))
    const singles: Group[] = due
      .filter((item) => !isRegisterCall(item.call) || item.solo)
      .map((item): Group => ({ kind: "single", item }))

    return [...batches, ...groups, ...singles]
  }

  /**
   * Runs before the parent leaves the outbox. Request ids derive from the
   * parent's, so a parent resent after a failed enqueue yields replays.
   */
  async function enqueueFollowUps(parent: OutboxItem, calls: LedgerCall[], report: FlushReport): Promise<void> {
    for (const [index, call] of calls.entries()) {
      await outbox.enqueue(call, clock(), `${parent.request_id}/${index}`)
      report.follow_ups++
    }
  }

  async function markFailed(item: OutboxItem, reason: string, report: FlushReport): Promise<void> {
    await outbox.save({ ...item, status: "failed", last_error: reason })
    report.failed++
    log.warn({ id: item.id, method: item.call.method, reason }, "Call moved to failed")
  }

  /**
   * Transient failures never move a call to failed; the delay stops growing at
   * `maxDelayMs`. Members of one batch share a single schedule so they come
   * due together.
   */
  async function reschedule(items: OutboxItem[], reason: string, report: FlushReport): Promise<void> {
    const attempts = Math.max(0, ...items.map((item) => item.attempts)) + 1
    const delay = computeBackoff(attempts, retry, random)
    const nextAttemptAt = clock() + delay
    for (const item of items) {
      await outbox.save({ ...item, attempts, next_attempt_at: nextAttemptAt, last_error: reason })
      report.rescheduled++
    }

    const ids = items.map((item) => item.id)
    if (attempts >= retry.maxAttempts && (attempts - retry.maxAttempts) % STALLED_LOG_EVERY === 0) {
      log.warn({ ids, attempts, delay, reason }, "Call still unconfirmed, retrying")
    } else {
      log.debug({ ids, attempts, delay }, "Call rescheduled")
    }
  }

  /** Returns false when the ledger could not be reached and the pass should stop. */
  async function sendSingle(item: OutboxItem, report: FlushReport): Promise<boolean> {
    const outcome = await client.submit(item.call, item.request_id)
    report.attempted++
    report.outcomes.set(item.id, outcome)

    switch (outcome.status) {
      case "delivered":
        await enqueueFollowUps(item, deriveFollowUps(item.call, outcome.result), report)
        await outbox.remove(item.id)
        report.delivered++
        return true
      case "rejected":
        await markFailed(item, `${outcome.code}: ${outcome.message}`, report)
        return true
      case "transient":
        await reschedule([item], outcome.message, report)
        return false
    }
  }

  async function sendBatch(key: string, items: OutboxItem[], report: FlushReport): Promise<boolean> {
    const members: Array<{ item: OutboxItem; call: RegisterCall }> = []
    for (const item of items) {
      if (isRegisterCall(item.call)) members.push({ item, call: item.call })
    }

    // Persist membership first so a retry resends exactly this batch
    for (const { item } of members) {
      if (item.batch_key !== key) await outbox.save({ ...item, batch_key: key })
    }

    const outcome = await client.submit(
      toBatchCall(members.map((member) => member.call)),
      key
    )
    report.attempted += members.length

    switch (outcome.status) {
      case "delivered": {
        const views = splitBatchResult(
          members.map((member) => member.call),
          outcome.result
        )
        for (const [index, { item, call }] of members.entries()) {
          const view = views[index] ?? null
          if (view) await enqueueFollowUps(item, deriveFollowUps(call, view), report)
          await outbox.remove(item.id)
          report.delivered++
          report.outcomes.set(item.id, { ...outcome, result: view })
        }
        return true
      }
      case "rejected": {
        // One bad row rejects the whole batch; resend the members on their own
        log.warn({ key, code: outcome.code, size: members.length }, "Batch rejected, splitting")
        for (const { item } of members) {
          const solo: OutboxItem = { ...item, batch_key: null, solo: true }
          await outbox.save(solo)
          if (!(await sendSingle(solo, report))) return false
        }
        return true
      }
      case "transient":
        for (const { item } of members) report.outcomes.set(item.id, outcome)
        await reschedule(
          members.map(({ item }) => ({ ...item, batch_key: key })),
          outcome.message,
          report
        )
        return false
    }
  }

  async function runRound(report: FlushReport): Promise<{ reachable: boolean; followUps: number }> {
    const due = await outbox.listDue(clock())
    const before = report.follow_ups

    for (const group of planGroups(due)) {
      const reachable =
        group.kind === "single"
          ? await sendSingle(group.item, report)
          : await sendBatch(group.key, group.items, report)
      if (!reachable) {
        log.warn("Ledger unreachable, leaving remaining calls for the next flush")
        return { reachable: false, followUps: report.follow_ups - before }
      }
    }
    return { reachable: true, followUps: report.follow_ups - before }
  }

  async function flushOnce(): Promise<FlushReport> {
    const report = emptyReport()
    for (let round = 0; round < MAX_ROUNDS; round++) {
      const { reachable, followUps } = await runRound(report)
      if (!reachable || followUps === 0) break
    }
    if (report.attempted > 0) {
      log.info(
        {
          attempted: report.attempted,
          delivered: report.delivered,
          rescheduled: report.rescheduled,
          failed: report.failed,
          followUps: report.follow_ups,
        },
        "Outbox flushed"
      )
    }
    return report
  }

  return {
    flush() {
      const run = chain.then(() => flushOnce())
      chain = run.then(
        () => undefined,
        () => undefined
      )
      return run
    },
  }
}
