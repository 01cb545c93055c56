// =============================================================================
// FakeTrace - Ledger Calls & Log Entries
// =============================================================================

import { z } from "zod"
import {
  AcknowledgeInputSchema,
  type Alert,
  type AlertOutcome,
  type AlertRule,
  BatchAcknowledgeInputSchema,
  type BatchAcknowledgeResult,
  CheckThresholdsInputSchema,
  type CheckThresholdsResult,
  ClearVideoRuleInputSchema,
  FirstDetectionInputSchema,
  GeoSpreadInputSchema,
  ReuploadInputSchema,
  SetCooldownInputSchema,
  SetGlobalRuleInputSchema,
  SetVideoRuleInputSchema,
} from "./alerts.js"
import type { LedgerErrorInfo } from "./errors.js"
import {
  AuthorizeInputSchema,
  DeauthorizeInputSchema,
  type IdentityRecord,
  type OwnershipTransfer,
  TransferOwnershipInputSchema,
} from "./identity.js"
import { AddressSchema, UnixSecondsSchema } from "./schemas.js"
import {
  type LineageRecord,
  RecordSpreadInputSchema,
  RegisterLineageInputSchema,
  type SpreadResult,
} from "./spread.js"
import {
  BatchRegisterInputSchema,
  type BatchRegisterResult,
  RegisterVideoInputSchema,
  type RegisterResult,
} from "./video.js"

// -----------------------------------------------------------------------------
// Call Envelope
// -----------------------------------------------------------------------------

export const LedgerCallSchema = z.discriminatedUnion("method", [
  z.object({ method: z.literal("authorize"), params: AuthorizeInputSchema }),
  z.object({ method: z.literal("deauthorize"), params: DeauthorizeInputSchema }),
  z.object({ method: z.literal("transferOwnership"), params: TransferOwnershipInputSchema }),
  z.object({ method: z.literal("registerVideo"), params: RegisterVideoInputSchema }),
  z.object({ method: z.literal("batchRegisterVideos"), params: BatchRegisterInputSchema }),
  z.object({ method: z.literal("recordSpread"), params: RecordSpreadInputSchema }),
  z.object({ method: z.literal("registerLineage"), params: RegisterLineageInputSchema }),
  z.object({ method: z.literal("triggerFirstDetection"), params: FirstDetectionInputSchema }),
  z.object({ method: z.literal("triggerReupload"), params: ReuploadInputSchema }),
  z.object({ method: z.literal("triggerGeoSpread"), params: GeoSpreadInputSchema }),
  z.object({ method: z.literal("checkThresholds"), params: CheckThresholdsInputSchema }),
  z.object({ method: z.literal("acknowledgeAlert"), params: AcknowledgeInputSchema }),
  z.object({ method: z.literal("batchAcknowledgeAlerts"), params: BatchAcknowledgeInputSchema }),
  z.object({ method: z.literal("setGlobalRule"), params: SetGlobalRuleInputSchema }),
  z.object({ method: z.literal("setVideoRule"), params: SetVideoRuleInputSchema }),
  z.object({ method: z.literal("clearVideoRule"), params: ClearVideoRuleInputSchema }),
  z.object({ method: z.literal("setCooldown"), params: SetCooldownInputSchema }),
])
export type LedgerCall = z.infer<typeof LedgerCallSchema>
export type LedgerMethod = LedgerCall["method"]
export type LedgerCallOf<M extends LedgerMethod> = Extract<LedgerCall, { method: M }>

// -----------------------------------------------------------------------------
// Results
// -----------------------------------------------------------------------------

export interface LedgerResultMap {
  authorize: IdentityRecord
  deauthorize: IdentityRecord
  transferOwnership: OwnershipTransfer
  registerVideo: RegisterResult
  batchRegisterVideos: BatchRegisterResult
  recordSpread: SpreadResult
  registerLineage: LineageRecord
  triggerFirstDetection: AlertOutcome
  triggerReupload: AlertOutcome
  triggerGeoSpread: AlertOutcome
  checkThresholds: CheckThresholdsResult
  acknowledgeAlert: Alert
  batchAcknowledgeAlerts: BatchAcknowledgeResult
  setGlobalRule: AlertRule
  setVideoRule: AlertRule
  clearVideoRule: { content_hash: string; cleared: boolean }
  setCooldown: { seconds: number }
}

export type ExecutionSuccess = {
  [M in LedgerMethod]: {
    ok: true
    sequence: number
    timestamp: number
    method: M
    result: LedgerResultMap[M]
  }
}[LedgerMethod]

export interface ExecutionFailure {
  ok: false
  sequence: number
  timestamp: number
  method: LedgerMethod
  error: LedgerErrorInfo
}

export type ExecutionOutcome = ExecutionSuccess | ExecutionFailure

// -----------------------------------------------------------------------------
// Log Entries
// -----------------------------------------------------------------------------

export const DigestSchema = z.string().regex(/^[a-f0-9]{64}$/)

export const LogEntrySchema = z.object({
  sequence: z.number().int().positive(),
  timestamp: UnixSecondsSchema,
  caller: AddressSchema,
  request_id: z.string().max(128).nullable(),
  call: LedgerCallSchema,
  prev_digest: DigestSchema,
  digest: DigestSchema,
})
export type LogEntry = z.infer<typeof LogEntrySchema>

export const LedgerGenesisSchema = z.object({
  owner: AddressSchema,
  timestamp: UnixSecondsSchema,
})
export type LedgerGenesis = z.infer<typeof LedgerGenesisSchema>
