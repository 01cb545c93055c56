// =============================================================================
// Alert Engine - Rate-Limited, Severity-Classified Alerts
// =============================================================================

import {
  type Alert,
  type AlertOutcome,
  type AlertRule,
  type AlertType,
  type BatchAcknowledgeResult,
  type CheckThresholdsInput,
  type CheckThresholdsResult,
  DEFAULT_ALERT_RULE,
  DEFAULT_COOLDOWN_SECONDS,
  type FirstDetectionInput,
  type GeoSpreadInput,
  type Page,
  type ReuploadInput,
  type Severity,
  type SuppressionReason,
} from "@faketrace/shared-types"
import type { AccessRegistry } from "./accessRegistry.js"
import {
  type CallContext,
  formatBasisPoints,
  paginate,
  requireBasisPoints,
  requireNonZeroHash,
} from "./context.js"
import { LedgerError } from "./errors.js"
import { compositeKey } from "./hasher.js"

// -----------------------------------------------------------------------------
// Severity Classification
// -----------------------------------------------------------------------------

export function firstDetectionSeverity(confidenceBp: number): Severity {
  if (confidenceBp >= 8000) return "Critical"
  if (confidenceBp >= 6000) return "High"
  return "Medium"
}

export function reuploadSeverity(reuploadCount: number): Severity {
  if (reuploadCount >= 10) return "Critical"
  if (reuploadCount >= 5) return "High"
  return "Medium"
}

export function geoSpreadSeverity(uniqueCountries: number): Severity {
  return uniqueCountries >= 10 ? "Critical" : "High"
}

const THRESHOLD_SEVERITY: Record<Extract<AlertType, "DetectionThreshold" | "ViralSpread">, Severity> = {
  DetectionThreshold: "High",
  ViralSpread: "Critical",
}

// -----------------------------------------------------------------------------
// Alert Engine Interface
// -----------------------------------------------------------------------------

export interface AlertEngine {
  triggerFirstDetection(ctx: CallContext, input: FirstDetectionInput): AlertOutcome
  triggerReupload(ctx: CallContext, input: ReuploadInput): AlertOutcome
  triggerGeoSpread(ctx: CallContext, input: GeoSpreadInput): AlertOutcome
  checkThresholds(ctx: CallContext, input: CheckThresholdsInput): CheckThresholdsResult
  acknowledge(ctx: CallContext, alertId: number): Alert
  batchAcknowledge(ctx: CallContext, alertIds: number[]): BatchAcknowledgeResult
  setGlobalRule(ctx: CallContext, rule: AlertRule): AlertRule
  setVideoRule(ctx: CallContext, contentHash: string, rule: AlertRule): AlertRule
  clearVideoRule(ctx: CallContext, contentHash: string): boolean
  setCooldown(ctx: CallContext, seconds: number): number
  getAlert(alertId: number): Alert
  getVideoAlerts(contentHash: string): Alert[]
  listAlerts(offset: number, limit: number): Page<Alert>
  getEffectiveRule(contentHash: string): AlertRule
  getGlobalRule(): AlertRule
  cooldown(): number
  totalAlerts(): number
  unacknowledgedCount(): number
}

interface AlertDraft {
  content_hash: string
  alert_type: AlertType
  severity: Severity
  message: string
  trigger_ip_hash: string | null
  trigger_country: string | null
}

// -----------------------------------------------------------------------------
// Create Alert Engine
// -----------------------------------------------------------------------------

export function createAlertEngine(registry: AccessRegistry): AlertEngine {
  // Alert ids are 1-based positions in this list
  const alerts: Alert[] = []
  const alertsByVideo = new Map<string, number[]>()
  // Keyed by compositeKey(contentHash, alertType)
  const lastAlertAt = new Map<string, number>()
  const videoRules = new Map<string, AlertRule>()
  let globalRule: AlertRule = { ...DEFAULT_ALERT_RULE }
  let cooldownSeconds = DEFAULT_COOLDOWN_SECONDS

  function effectiveRule(contentHash: string): AlertRule {
    // A per-video rule replaces the global one wholesale
    return videoRules.get(contentHash) ?? globalRule
  }

  function suppress(
    ctx: CallContext,
    draft: Pick<AlertDraft, "content_hash" | "alert_type">,
    reason: SuppressionReason
  ): AlertOutcome {
    ctx.emit("AlertSuppressed", { content_hash: draft.content_hash, alert_type: draft.alert_type, reason })
    return { status: "suppressed", alert_type: draft.alert_type, reason }
  }

  function fire(ctx: CallContext, draft: AlertDraft): AlertOutcome {
    const key = compositeKey(draft.content_hash, draft.alert_type)
    const last = lastAlertAt.get(key)
    if (last !== undefined && ctx.now - last < cooldownSeconds) {
      return suppress(ctx, draft, "cooldown")
    }

    const alert: Alert = {
      id: alerts.length + 1,
      ...draft,
      created_at: ctx.now,
      acknowledged: false,
      acknowledged_by: null,
      acknowledged_at: null,
    }
    alerts.push(alert)
    const forVideo = alertsByVideo.get(alert.content_hash)
    if (forVideo) forVideo.push(alert.id)
    else alertsByVideo.set(alert.content_hash, [alert.id])
    lastAlertAt.set(key, ctx.now)

    ctx.emit("AlertCreated", { alert: { ...alert } })
    return { status: "created", alert: { ...alert } }
  }

  function guardTrigger(ctx: CallContext, contentHash: string): AlertRule {
    registry.requireAuthorized(ctx.caller)
    requireNonZeroHash(contentHash)
    return effectiveRule(contentHash)
  }

  // ---------------------------------------------------------------------------
  // Triggers
  // ---------------------------------------------------------------------------

  function triggerFirstDetection(ctx: CallContext, input: FirstDetectionInput): AlertOutcome {
    const rule = guardTrigger(ctx, input.content_hash)
    requireBasisPoints(input.confidence_bp, "confidence_bp")

    const draft: AlertDraft = {
      content_hash: input.content_hash,
      alert_type: "FirstDetection",
      severity: firstDetectionSeverity(input.confidence_bp),
      message: `Deepfake first detected in ${input.country || "unknown location"} with ${formatBasisPoints(input.confidence_bp)} confidence`,
      trigger_ip_hash: input.ip_hash,
      trigger_country: input.country,
    }
    if (!rule.enabled) return suppress(ctx, draft, "rule_disabled")
    return fire(ctx, draft)
  }

  function triggerReupload(ctx: CallContext, input: ReuploadInput): AlertOutcome {
    const rule = guardTrigger(ctx, input.content_hash)

    const draft: AlertDraft = {
      content_hash: input.content_hash,
      alert_type: "Reupload",
      severity: reuploadSeverity(input.reupload_count),
      message: `Same source re-uploaded the video ${input.reupload_count} times from ${input.country || "unknown location"}`,
      trigger_ip_hash: input.ip_hash,
      trigger_country: input.country,
    }
    if (!rule.enabled) return suppress(ctx, draft, "rule_disabled")
    if (input.reupload_count < rule.reupload_threshold) return suppress(ctx, draft, "below_threshold")
    return fire(ctx, draft)
  }

  function triggerGeoSpread(ctx: CallContext, input: GeoSpreadInput): AlertOutcome {
    const rule = guardTrigger(ctx, input.content_hash)

    const draft: AlertDraft = {
      content_hash: input.content_hash,
      alert_type: "GeoSpread",
      severity: geoSpreadSeverity(input.unique_countries),
      message: `Video spread from ${input.from_country} to ${input.to_country}, now seen in ${input.unique_countries} countries`,
      trigger_ip_hash: null,
      trigger_country: input.to_country,
    }
    if (!rule.enabled) return suppress(ctx, draft, "rule_disabled")
    if (input.unique_countries < rule.country_threshold) return suppress(ctx, draft, "below_threshold")
    return fire(ctx, draft)
  }

  function checkThresholds(ctx: CallContext, input: CheckThresholdsInput): CheckThresholdsResult {
    const rule = guardTrigger(ctx, input.content_hash)

    const detectionDraft: AlertDraft = {
      content_hash: input.content_hash,
      alert_type: "DetectionThreshold",
      severity: THRESHOLD_SEVERITY.DetectionThreshold,
      message: `Video detected ${input.detection_count} times`,
      trigger_ip_hash: null,
      trigger_country: null,
    }
    const viralDraft: AlertDraft = {
      content_hash: input.content_hash,
      alert_type: "ViralSpread",
      severity: THRESHOLD_SEVERITY.ViralSpread,
      message: `Video reached ${input.spread_count} sightings across ${input.unique_countries} countries`,
      trigger_ip_hash: null,
      trigger_country: null,
    }

    if (!rule.enabled) {
      return {
        detection: suppress(ctx, detectionDraft, "rule_disabled"),
        viral: suppress(ctx, viralDraft, "rule_disabled"),
      }
    }

    const detection = isPositiveMultiple(input.detection_count, rule.detection_threshold)
      ? fire(ctx, detectionDraft)
      : suppress(ctx, detectionDraft, "below_threshold")
    const viral = isPositiveMultiple(input.spread_count, rule.spread_threshold)
      ? fire(ctx, viralDraft)
      : suppress(ctx, viralDraft, "below_threshold")

    return { detection, viral }
  }

  // ---------------------------------------------------------------------------
  // Acknowledgement
  // ---------------------------------------------------------------------------

  function requireAlert(alertId: number): Alert {
    const alert = Number.isInteger(alertId) && alertId >= 1 ? alerts[alertId - 1] : undefined
    if (!alert) {
      throw new LedgerError("InvalidId", `no alert with id ${alertId}`, { alert_id: alertId })
    }
    return alert
  }

  function markAcknowledged(ctx: CallContext, alert: Alert): void {
    alert.acknowledged = true
    alert.acknowledged_by = ctx.caller
    alert.acknowledged_at = ctx.now
    ctx.emit("AlertAcknowledged", {
      alert_id: alert.id,
      content_hash: alert.content_hash,
      acknowledged_by: ctx.caller,
    })
  }

  function acknowledge(ctx: CallContext, alertId: number): Alert {
    registry.requireAuthorized(ctx.caller)
    const alert = requireAlert(alertId)
    if (alert.acknowledged) {
      throw new LedgerError("AlreadyAcknowledged", `alert ${alertId} is already acknowledged`, {
        alert_id: alertId,
      })
    }
    markAcknowledged(ctx, alert)
    return { ...alert }
  }

  function batchAcknowledge(ctx: CallContext, alertIds: number[]): BatchAcknowledgeResult {
    registry.requireAuthorized(ctx.caller)
    const targets = alertIds.map(requireAlert)

    const acknowledged: number[] = []
    const skipped: number[] = []
    for (const alert of targets) {
      if (alert.acknowledged) {
        skipped.push(alert.id)
        continue
      }
      markAcknowledged(ctx, alert)
      acknowledged.push(alert.id)
    }
    return { acknowledged, skipped }
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  function setGlobalRule(ctx: CallContext, rule: AlertRule): AlertRule {
    registry.requireOwner(ctx.caller)
    validateRule(rule)
    globalRule = { ...rule }
    ctx.emit("AlertRuleUpdated", { content_hash: null, rule: { ...rule } })
    return { ...globalRule }
  }

  function setVideoRule(ctx: CallContext, contentHash: string, rule: AlertRule): AlertRule {
    registry.requireOwner(ctx.caller)
    requireNonZeroHash(contentHash)
    validateRule(rule)
    videoRules.set(contentHash, { ...rule })
    ctx.emit("AlertRuleUpdated", { content_hash: contentHash, rule: { ...rule } })
    return { ...rule }
  }

  function clearVideoRule(ctx: CallContext, contentHash: string): boolean {
    registry.requireOwner(ctx.caller)
    requireNonZeroHash(contentHash)
    const cleared = videoRules.delete(contentHash)
    if (cleared) ctx.emit("AlertRuleUpdated", { content_hash: contentHash, rule: null })
    return cleared
  }

  function setCooldown(ctx: CallContext, seconds: number): number {
    registry.requireOwner(ctx.caller)
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new LedgerError("InvalidCooldown", "cooldown must be a non-negative integer", { seconds })
    }
    const previous = cooldownSeconds
    cooldownSeconds = seconds
    ctx.emit("CooldownUpdated", { previous_seconds: previous, seconds })
    return cooldownSeconds
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  function getVideoAlerts(contentHash: string): Alert[] {
    return (alertsByVideo.get(contentHash) ?? []).map((id) => ({ ...requireAlert(id) }))
  }

  function unacknowledgedCount(): number {
    return alerts.reduce((count, alert) => (alert.acknowledged ? count : count + 1), 0)
  }

  return {
    triggerFirstDetection,
    triggerReupload,
    triggerGeoSpread,
    checkThresholds,
    acknowledge,
    batchAcknowledge,
    setGlobalRule,
    setVideoRule,
    clearVideoRule,
    setCooldown,
    getAlert: (alertId) => ({ ...requireAlert(alertId) }),
    getVideoAlerts,
    listAlerts: (offset, limit) =>
      paginate(alerts.map((alert) => ({ ...alert })), offset, limit),
    getEffectiveRule: (contentHash) => ({ ...effectiveRule(contentHash) }),
    getGlobalRule: () => ({ ...globalRule }),
    cooldown: () => cooldownSeconds,
    totalAlerts: () => alerts.length,
    unacknowledgedCount,
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function isPositiveMultiple(value: number, threshold: number): boolean {
  return value > 0 && value % threshold === 0
}

function validateRule(rule: AlertRule): void {
  const thresholds = [
    rule.detection_threshold,
    rule.spread_threshold,
    rule.country_threshold,
    rule.reupload_threshold,
  ]
  if (thresholds.some((value) => !Number.isInteger(value) || value < 1)) {
    throw new LedgerError("InvalidRule", "every threshold must be a positive integer", {
      rule,
    })
  }
}
