// =============================================================================
// FakeTrace - Ledger Event Types
// =============================================================================

import type { Alert, AlertRule, AlertType, SuppressionReason } from "./alerts.js"
import type { NodeClass } from "./identity.js"

// -----------------------------------------------------------------------------
// Event Payloads
// -----------------------------------------------------------------------------

// Each payload carries enough for a notifier to render a message without
// querying the ledger again.
export interface LedgerEventPayloads {
  NodeAuthorized: { address: string; display_name: string; node_class: NodeClass }
  NodeDeauthorized: { address: string }
  OwnershipTransferred: { previous_owner: string; new_owner: string }
  VideoRegistered: {
    content_hash: string
    perceptual_hash: string
    is_deepfake: boolean
    confidence_bp: number
    submitter: string
  }
  DeepfakeDetected: {
    content_hash: string
    confidence_bp: number
    lipsync_bp: number
    fact_check_bp: number
    country: string
    city: string
    latitude: number
    longitude: number
  }
  AuthenticVideoConfirmed: { content_hash: string; confidence_bp: number; country: string }
  VideoRedetected: {
    content_hash: string
    detection_count: number
    ip_hash: string
    country: string
    city: string
    reporter: string
  }
  BatchItemSkipped: { index: number; reason: "zero_hash" }
  SpreadRecorded: {
    content_hash: string
    index: number
    ip_hash: string
    country: string
    city: string
    platform: string
    source_url: string
    reporter: string
  }
  SameIpReupload: {
    content_hash: string
    ip_hash: string
    upload_count: number
    seconds_since_first_upload: number
  }
  NewLocationSpread: {
    content_hash: string
    previous_country: string
    new_country: string
    city: string
    unique_countries: number
  }
  ViralSpreadWarning: { content_hash: string; spread_count: number; unique_countries: number }
  LineageRegistered: {
    content_hash: string
    parent_hash: string
    generation: number
    mutations: string[]
    similarity_bp: number | null
  }
  AlertCreated: { alert: Alert }
  AlertSuppressed: { content_hash: string; alert_type: AlertType; reason: SuppressionReason }
  AlertAcknowledged: { alert_id: number; content_hash: string; acknowledged_by: string }
  AlertRuleUpdated: { content_hash: string | null; rule: AlertRule | null }
  CooldownUpdated: { previous_seconds: number; seconds: number }
}

export type LedgerEventType = keyof LedgerEventPayloads

export type LedgerEventMap = {
  [K in LedgerEventType]: {
    type: K
    sequence: number
    timestamp: number
    data: LedgerEventPayloads[K]
  }
}

export type LedgerEvent = LedgerEventMap[LedgerEventType]

export interface LedgerEventListeners {
  event: (event: LedgerEvent) => void
}
