// =============================================================================
// FakeTrace - Ledger Event Notifier
// =============================================================================

import { firstDetectionSeverity, formatBasisPoints } from "@faketrace/ledger-core"
import {
  type LedgerEvent,
  type LedgerEventListeners,
  type LedgerEventType,
  SEVERITY_RANK,
  type Severity,
} from "@faketrace/shared-types"
import type { EventEmitter } from "eventemitter3"
import { request } from "undici"
import { createLogger } from "./logger.js"

const log = createLogger("notifier")

// Re-detections below this count stay at Low
const REDETECTION_NOTICE_COUNT = 3

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface Notification {
  kind: LedgerEventType
  severity: Severity
  title: string
  text: string
  content_hash: string | null
  sequence: number
  timestamp: number
}

export type DeliverFn = (notification: Notification) => Promise<void>

export interface NotifierOptions {
  minSeverity: Severity
  deliver: DeliverFn
}

export interface Notifier {
  attach(events: EventEmitter<LedgerEventListeners>): () => void
  handle(event: LedgerEvent): void
  /** Resolves once every queued notification has been attempted. */
  drain(): Promise<void>
}

// -----------------------------------------------------------------------------
// Formatting
// -----------------------------------------------------------------------------

export function formatLedgerEvent(event: LedgerEvent): Notification | null {
  const base = { kind: event.type, sequence: event.sequence, timestamp: event.timestamp }

  switch (event.type) {
    case "AlertCreated": {
      const { alert } = event.data
      return {
        ...base,
        severity: alert.severity,
        title: `${alert.severity} ${alert.alert_type} alert #${alert.id}`,
        text: alert.message,
        content_hash: alert.content_hash,
      }
    }
    case "DeepfakeDetected": {
      const where = event.data.city ? `${event.data.city}, ${event.data.country}` : event.data.country
      return {
        ...base,
        severity: firstDetectionSeverity(event.data.confidence_bp),
        title: "Deepfake detected",
        text: `Deepfake detected in ${where || "unknown location"} with ${formatBasisPoints(event.data.confidence_bp)} confidence`,
        content_hash: event.data.content_hash,
      }
    }
    case "VideoRedetected":
      return {
        ...base,
        severity: event.data.detection_count >= REDETECTION_NOTICE_COUNT ? "Medium" : "Low",
        title: "Video re-detected",
        text: `Video detected ${event.data.detection_count} times, latest in ${event.data.country || "unknown location"}`,
        content_hash: event.data.content_hash,
      }
    case "SameIpReupload":
      return {
        ...base,
        severity: "Medium",
        title: "Same source re-upload",
        text: `Upload #${event.data.upload_count} from one source, ${event.data.seconds_since_first_upload}s after the first`,
        content_hash: event.data.content_hash,
      }
    case "NewLocationSpread":
      return {
        ...base,
        severity: "Medium",
        title: "Spread to a new country",
        text: `Video spread from ${event.data.previous_country} to ${event.data.new_country}, now in ${event.data.unique_countries} countries`,
        content_hash: event.data.content_hash,
      }
    case "ViralSpreadWarning":
      return {
        ...base,
        severity: "High",
        title: "Viral spread",
        text: `Video reached ${event.data.spread_count} sightings across ${event.data.unique_countries} countries`,
        content_hash: event.data.content_hash,
      }
    case "NodeDeauthorized":
      return {
        ...base,
        severity: "Medium",
        title: "Node deauthorized",
        text: `Node ${event.data.address} can no longer submit to the ledger`,
        content_hash: null,
      }
    case "OwnershipTransferred":
      return {
        ...base,
        severity: "High",
        title: "Ledger ownership transferred",
        text: `Ownership moved from ${event.data.previous_owner} to ${event.data.new_owner}`,
        content_hash: null,
      }
    default:
      return null
  }
}

// -----------------------------------------------------------------------------
// Webhook Delivery
// -----------------------------------------------------------------------------

export function createWebhookDelivery(url: string, timeoutMs: number): DeliverFn {
  return async (notification) => {
    const response = await request(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(notification),
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
    })
    await response.body.dump()

    if (response.statusCode >= 300) {
      throw new Error(`Webhook responded with ${response.statusCode}`)
    }
  }
}

// -----------------------------------------------------------------------------
// Create Notifier
// -----------------------------------------------------------------------------

export function createNotifier(options: NotifierOptions): Notifier {
  const threshold = SEVERITY_RANK[options.minSeverity]
  let queue: Promise<void> = Promise.resolve()

  function handle(event: LedgerEvent): void {
    const notification = formatLedgerEvent(event)
    if (!notification || SEVERITY_RANK[notification.severity] < threshold) return

    // Delivered one at a time, in ledger order
    queue = queue
      .then(() => options.deliver(notification))
      .then(
        () => log.debug({ kind: notification.kind, sequence: notification.sequence }, "Notification sent"),
        (err: unknown) =>
          log.error({ err, kind: notification.kind, sequence: notification.sequence }, "Notification failed")
      )
  }

  return {
    handle,
    attach(events) {
      events.on("event", handle)
      return () => {
        events.off("event", handle)
      }
    },
    drain: () => queue,
  }
}
