// =============================================================================
// Tracking Ledger - Deterministic Call Execution
// =============================================================================

import type {
  ExecutionOutcome,
  ExecutionSuccess,
  LedgerCall,
  LedgerEvent,
  LedgerEventListeners,
  LedgerEventMap,
  LedgerEventPayloads,
  LedgerEventType,
  LedgerGenesis,
} from "@faketrace/shared-types"
import { EventEmitter } from "eventemitter3"
import { type AccessRegistry, createAccessRegistry } from "./accessRegistry.js"
import { type AlertEngine, createAlertEngine } from "./alertEngine.js"
import type { CallContext } from "./context.js"
import { isLedgerError } from "./errors.js"
import type { LogEntryDraft } from "./log.js"
import { type SpreadTracker, createSpreadTracker } from "./spreadTracker.js"
import { type VideoLedger, createVideoLedger } from "./videoLedger.js"

// -----------------------------------------------------------------------------
// Tracking Ledger Interface
// -----------------------------------------------------------------------------

export interface TrackingLedger {
  readonly genesis: LedgerGenesis
  readonly registry: AccessRegistry
  readonly videos: VideoLedger
  readonly spread: SpreadTracker
  readonly alerts: AlertEngine
  /** Emits `event` once per ledger event, after the call that raised it succeeds. */
  readonly events: EventEmitter<LedgerEventListeners>
  execute(entry: LogEntryDraft): ExecutionOutcome
  lastSequence(): number
  lastTimestamp(): number
}

function toEvent<K extends LedgerEventType>(
  type: K,
  data: LedgerEventPayloads[K],
  sequence: number,
  timestamp: number
): LedgerEventMap[K] {
  return { type, sequence, timestamp, data }
}

// -----------------------------------------------------------------------------
// Create Tracking Ledger
// -----------------------------------------------------------------------------

export function createTrackingLedger(genesis: LedgerGenesis): TrackingLedger {
  const registry = createAccessRegistry(genesis)
  const videos = createVideoLedger(registry)
  const spread = createSpreadTracker(registry)
  const alerts = createAlertEngine(registry)
  const events = new EventEmitter<LedgerEventListeners>()

  let sequence = 0
  let timestamp = genesis.timestamp

  function dispatch(ctx: CallContext, call: LedgerCall): ExecutionSuccess {
    const base = { ok: true as const, sequence: sequence + 1, timestamp: ctx.now }

    switch (call.method) {
      case "authorize":
        return { ...base, method: call.method, result: registry.authorize(ctx, call.params) }
      case "deauthorize":
        return { ...base, method: call.method, result: registry.deauthorize(ctx, call.params.address) }
      case "transferOwnership":
        return {
          ...base,
          method: call.method,
          result: registry.transferOwnership(ctx, call.params.new_owner),
        }
      case "registerVideo":
        return { ...base, method: call.method, result: videos.register(ctx, call.params) }
      case "batchRegisterVideos":
        return { ...base, method: call.method, result: videos.batchRegister(ctx, call.params) }
      case "recordSpread":
        return { ...base, method: call.method, result: spread.recordSpread(ctx, call.params) }
      case "registerLineage":
        return { ...base, method: call.method, result: spread.registerLineage(ctx, call.params) }
      case "triggerFirstDetection":
        return { ...base, method: call.method, result: alerts.triggerFirstDetection(ctx, call.params) }
      case "triggerReupload":
        return { ...base, method: call.method, result: alerts.triggerReupload(ctx, call.params) }
      case "triggerGeoSpread":
        return { ...base, method: call.method, result: alerts.triggerGeoSpread(ctx, call.params) }
      case "checkThresholds":
        return { ...base, method: call.method, result: alerts.checkThresholds(ctx, call.params) }
      case "acknowledgeAlert":
        return { ...base, method: call.method, result: alerts.acknowledge(ctx, call.params.alert_id) }
      case "batchAcknowledgeAlerts":
        return {
          ...base,
          method: call.method,
          result: alerts.batchAcknowledge(ctx, call.params.alert_ids),
        }
      case "setGlobalRule":
        return { ...base, method: call.method, result: alerts.setGlobalRule(ctx, call.params.rule) }
      case "setVideoRule":
        return {
          ...base,
          method: call.method,
          result: alerts.setVideoRule(ctx, call.params.content_hash, call.params.rule),
        }
      case "clearVideoRule":
        return {
          ...base,
          method: call.method,
          result: {
            content_hash: call.params.content_hash,
            cleared: alerts.clearVideoRule(ctx, call.params.content_hash),
          },
        }
      case "setCooldown":
        return {
          ...base,
          method: call.method,
          result: { seconds: alerts.setCooldown(ctx, call.params.seconds) },
        }
      default: {
        const unreachable: never = call
        throw new Error(`Unknown ledger method: ${JSON.stringify(unreachable)}`)
      }
    }
  }

  function execute(entry: LogEntryDraft): ExecutionOutcome {
    if (entry.sequence !== sequence + 1) {
      throw new Error(`Out-of-order log entry: expected sequence ${sequence + 1}, got ${entry.sequence}`)
    }
    if (entry.timestamp < timestamp) {
      throw new Error(`Log entry ${entry.sequence} timestamp ${entry.timestamp} precedes ${timestamp}`)
    }

    const pending: LedgerEvent[] = []
    const ctx: CallContext = {
      caller: entry.caller,
      now: entry.timestamp,
      emit: (type, data) => {
        pending.push(toEvent(type, data, entry.sequence, entry.timestamp))
      },
    }

    let outcome: ExecutionOutcome
    try {
      outcome = dispatch(ctx, entry.call)
    } catch (err) {
      if (!isLedgerError(err)) throw err
      outcome = {
        ok: false,
        sequence: entry.sequence,
        timestamp: entry.timestamp,
        method: entry.call.method,
        error: err.toInfo(),
      }
    }

    // Failed entries still occupy their sequence number
    sequence = entry.sequence
    timestamp = entry.timestamp

    if (outcome.ok) {
      for (const event of pending) {
        events.emit("event", event)
      }
    }
    return outcome
  }

  return {
    genesis,
    registry,
    videos,
    spread,
    alerts,
    events,
    execute,
    lastSequence: () => sequence,
    lastTimestamp: () => timestamp,
  }
}
