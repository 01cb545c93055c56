// =============================================================================
// FakeTrace - Alert Types
// =============================================================================

import { z } from "zod"
import {
  AddressSchema,
  BasisPointsSchema,
  Bytes32Schema,
  ShortTextSchema,
  UnixSecondsSchema,
} from "./schemas.js"

// -----------------------------------------------------------------------------
// Enumerations
// -----------------------------------------------------------------------------

export const AlertTypeSchema = z.enum([
  "FirstDetection",
  "Reupload",
  "GeoSpread",
  "DetectionThreshold",
  "ViralSpread",
])
export type AlertType = z.infer<typeof AlertTypeSchema>

export const SeveritySchema = z.enum(["Low", "Medium", "High", "Critical"])
export type Severity = z.infer<typeof SeveritySchema>

export const SEVERITY_RANK: Record<Severity, number> = {
  Low: 0,
  Medium: 1,
  High: 2,
  Critical: 3,
}

// -----------------------------------------------------------------------------
// Rules
// -----------------------------------------------------------------------------

export const AlertRuleSchema = z.object({
  detection_threshold: z.number().int(),
  spread_threshold: z.number().int(),
  country_threshold: z.number().int(),
  reupload_threshold: z.number().int(),
  enabled: z.boolean().default(true),
})
export type AlertRule = z.infer<typeof AlertRuleSchema>

export const DEFAULT_ALERT_RULE: AlertRule = {
  detection_threshold: 10,
  spread_threshold: 50,
  country_threshold: 3,
  reupload_threshold: 2,
  enabled: true,
}

export const DEFAULT_COOLDOWN_SECONDS = 300

export const SetGlobalRuleInputSchema = z.object({
  rule: AlertRuleSchema,
})
export type SetGlobalRuleInput = z.infer<typeof SetGlobalRuleInputSchema>

export const SetVideoRuleInputSchema = z.object({
  content_hash: Bytes32Schema,
  rule: AlertRuleSchema,
})
export type SetVideoRuleInput = z.infer<typeof SetVideoRuleInputSchema>

export const ClearVideoRuleInputSchema = z.object({
  content_hash: Bytes32Schema,
})
export type ClearVideoRuleInput = z.infer<typeof ClearVideoRuleInputSchema>

export const SetCooldownInputSchema = z.object({
  seconds: z.number().int(),
})
export type SetCooldownInput = z.infer<typeof SetCooldownInputSchema>

// -----------------------------------------------------------------------------
// Alert Record
// -----------------------------------------------------------------------------

export const AlertSchema = z.object({
  id: z.number().int().positive(),
  content_hash: Bytes32Schema,
  alert_type: AlertTypeSchema,
  severity: SeveritySchema,
  message: z.string(),
  created_at: UnixSecondsSchema,
  acknowledged: z.boolean(),
  acknowledged_by: AddressSchema.nullable(),
  acknowledged_at: UnixSecondsSchema.nullable(),
  trigger_ip_hash: Bytes32Schema.nullable(),
  trigger_country: z.string().nullable(),
})
export type Alert = z.infer<typeof AlertSchema>

export const SuppressionReasonSchema = z.enum(["cooldown", "below_threshold", "rule_disabled"])
export type SuppressionReason = z.infer<typeof SuppressionReasonSchema>

export type AlertOutcome =
  | { status: "created"; alert: Alert }
  | { status: "suppressed"; alert_type: AlertType; reason: SuppressionReason }

// -----------------------------------------------------------------------------
// Trigger Inputs
// -----------------------------------------------------------------------------

export const FirstDetectionInputSchema = z.object({
  content_hash: Bytes32Schema,
  confidence_bp: BasisPointsSchema,
  country: ShortTextSchema,
  ip_hash: Bytes32Schema,
})
export type FirstDetectionInput = z.infer<typeof FirstDetectionInputSchema>

export const ReuploadInputSchema = z.object({
  content_hash: Bytes32Schema,
  ip_hash: Bytes32Schema,
  reupload_count: z.number().int().nonnegative(),
  country: ShortTextSchema,
})
export type ReuploadInput = z.infer<typeof ReuploadInputSchema>

export const GeoSpreadInputSchema = z.object({
  content_hash: Bytes32Schema,
  from_country: ShortTextSchema,
  to_country: ShortTextSchema,
  unique_countries: z.number().int().nonnegative(),
})
export type GeoSpreadInput = z.infer<typeof GeoSpreadInputSchema>

export const CheckThresholdsInputSchema = z.object({
  content_hash: Bytes32Schema,
  detection_count: z.number().int().nonnegative(),
  spread_count: z.number().int().nonnegative(),
  unique_countries: z.number().int().nonnegative(),
})
export type CheckThresholdsInput = z.infer<typeof CheckThresholdsInputSchema>

export interface CheckThresholdsResult {
  detection: AlertOutcome
  viral: AlertOutcome
}

export const AcknowledgeInputSchema = z.object({
  alert_id: z.number().int(),
})
export type AcknowledgeInput = z.infer<typeof AcknowledgeInputSchema>

export const BatchAcknowledgeInputSchema = z.object({
  alert_ids: z.array(z.number().int()).max(200),
})
export type BatchAcknowledgeInput = z.infer<typeof BatchAcknowledgeInputSchema>

export interface BatchAcknowledgeResult {
  acknowledged: number[]
  skipped: number[]
}
