// =============================================================================
// FakeTrace - Edge Node
// =============================================================================

import type { LedgerCall } from "@faketrace/shared-types"
import {
  type DetectionReport,
  type LineageReport,
  type SightingReport,
  detectionToCall,
  lineageToCall,
  sightingToCall,
} from "./adapters.js"
import { createLogger } from "./logger.js"
import type { Outbox } from "./outbox.js"
import type { FlushReport, Submitter } from "./submitter.js"

const log = createLogger("edge-node")

/** What a user sees while a call waits in the outbox. */
export const PENDING_MESSAGE = "result pending — confirmation delayed"

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type ReportStatus =
  | {
      request_id: string
      status: "confirmed"
      sequence: number | null
      already_done: boolean
      result: unknown
    }
  | { request_id: string; status: "rejected"; code: string; message: string }
  | { request_id: string; status: "pending"; message: string }

export interface OutboxStatus {
  pending: number
  failed: number
  failures: Array<{ id: string; method: LedgerCall["method"]; last_error: string | null }>
}

export interface EdgeNodeOptions {
  outbox: Outbox
  submitter: Submitter
  ipHashSalt: string
  clock?: () => number
}

export interface EdgeNode {
  reportDetection(report: DetectionReport): Promise<ReportStatus>
  reportSighting(report: SightingReport): Promise<ReportStatus>
  reportLineage(report: LineageReport): Promise<ReportStatus>
  flush(): Promise<FlushReport>
  /** Puts failed calls back in the queue and flushes. */
  requeueFailed(): Promise<{ requeued: number; report: FlushReport }>
  status(): Promise<OutboxStatus>
}

// -----------------------------------------------------------------------------
// Create Edge Node
// -----------------------------------------------------------------------------

export function createEdgeNode(options: EdgeNodeOptions): EdgeNode {
  const { outbox, submitter, ipHashSalt } = options
  const clock = options.clock ?? Date.now

  /** Queues first so the call survives a crash, then tries to deliver right away. */
  async function submit(call: LedgerCall): Promise<ReportStatus> {
    const item = await outbox.enqueue(call, clock())
    const report = await submitter.flush()
    const outcome = report.outcomes.get(item.id)

    if (outcome?.status === "delivered") {
      return {
        request_id: item.request_id,
        status: "confirmed",
        sequence: outcome.sequence,
        already_done: outcome.already_done,
        result: outcome.result,
      }
    }
    if (outcome?.status === "rejected") {
      return { request_id: item.request_id, status: "rejected", code: outcome.code, message: outcome.message }
    }
    log.info({ id: item.id, method: call.method }, "Call queued for later delivery")
    return { request_id: item.request_id, status: "pending", message: PENDING_MESSAGE }
  }

  async function status(): Promise<OutboxStatus> {
    const [pending, failed] = await Promise.all([outbox.listPending(), outbox.listFailed()])
    return {
      pending: pending.length,
      failed: failed.length,
      failures: failed.map((item) => ({ id: item.id, method: item.call.method, last_error: item.last_error })),
    }
  }

  async function requeueFailed(): Promise<{ requeued: number; report: FlushReport }> {
    const requeued = await outbox.requeueFailed(clock())
    const report = await submitter.flush()
    return { requeued, report }
  }

  return {
    reportDetection: (report) => submit(detectionToCall(report, ipHashSalt)),
    reportSighting: (report) => submit(sightingToCall(report, ipHashSalt)),
    reportLineage: (report) => submit(lineageToCall(report)),
    flush: () => submitter.flush(),
    requeueFailed,
    status,
  }
}
