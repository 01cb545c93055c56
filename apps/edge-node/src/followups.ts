// =============================================================================
// FakeTrace - Follow-Up Alert Calls
// =============================================================================

import { type LedgerCall, LedgerCallSchema } from "@faketrace/shared-types"
import { z } from "zod"

// Only the result fields follow-ups depend on
const RegisterResultSchema = z.object({
  content_hash: z.string(),
  is_new: z.boolean(),
  detection_count: z.number().int(),
})

const BatchRegisterResultSchema = z.object({
  items: z.array(
    z.object({
      index: z.number().int(),
      status: z.enum(["registered", "redetected", "skipped"]),
      detection_count: z.number().int(),
    })
  ),
})

const SpreadResultSchema = z.object({
  spread_count: z.number().int(),
  same_ip_reupload: z.boolean(),
  reupload_count: z.number().int(),
  new_country: z.boolean(),
  previous_country: z.string().nullable(),
  unique_countries: z.number().int(),
})

export type RegisterResultView = z.infer<typeof RegisterResultSchema>

/**
 * Alert calls implied by a delivered call. Registrations feed the detection
 * threshold and, when new and fake, a first-detection alert. Sightings feed
 * re-upload, geographic and viral checks.
 */
export function deriveFollowUps(call: LedgerCall, result: unknown): LedgerCall[] {
  switch (call.method) {
    case "registerVideo": {
      const parsed = RegisterResultSchema.safeParse(result)
      if (!parsed.success) return []
      const { params } = call
      const followUps: LedgerCall[] = []
      if (parsed.data.is_new && params.is_deepfake) {
        followUps.push({
          method: "triggerFirstDetection",
          params: {
            content_hash: params.content_hash,
            confidence_bp: params.confidence_bp,
            country: params.country,
            ip_hash: params.ip_hash,
          },
        })
      }
      followUps.push({
        method: "checkThresholds",
        params: {
          content_hash: params.content_hash,
          detection_count: parsed.data.detection_count,
          spread_count: 0,
          unique_countries: 0,
        },
      })
      return followUps
    }

    case "recordSpread": {
      const parsed = SpreadResultSchema.safeParse(result)
      if (!parsed.success) return []
      const { params } = call
      const spread = parsed.data
      const followUps: LedgerCall[] = []
      if (spread.same_ip_reupload) {
        followUps.push({
          method: "triggerReupload",
          params: {
            content_hash: params.content_hash,
            ip_hash: params.ip_hash,
            reupload_count: spread.reupload_count,
            country: params.country,
          },
        })
      }
      if (spread.new_country && spread.previous_country !== null) {
        followUps.push({
          method: "triggerGeoSpread",
          params: {
            content_hash: params.content_hash,
            from_country: spread.previous_country,
            to_country: params.country,
            unique_countries: spread.unique_countries,
          },
        })
      }
      followUps.push({
        method: "checkThresholds",
        params: {
          content_hash: params.content_hash,
          detection_count: 0,
          spread_count: spread.spread_count,
          unique_countries: spread.unique_countries,
        },
      })
      return followUps
    }

    default:
      return []
  }
}

// -----------------------------------------------------------------------------
// Batching
// -----------------------------------------------------------------------------

export type RegisterCall = Extract<LedgerCall, { method: "registerVideo" }>

export function isRegisterCall(call: LedgerCall): call is RegisterCall {
  return call.method === "registerVideo"
}

/** Column-wise batch of single registrations, in the given order. */
export function toBatchCall(calls: readonly RegisterCall[]): LedgerCall {
  const rows = calls.map((call) => call.params)
  return LedgerCallSchema.parse({
    method: "batchRegisterVideos",
    params: {
      content_hashes: rows.map((row) => row.content_hash),
      perceptual_hashes: rows.map((row) => row.perceptual_hash),
      is_deepfake: rows.map((row) => row.is_deepfake),
      confidence_bp: rows.map((row) => row.confidence_bp),
      lipsync_bp: rows.map((row) => row.lipsync_bp),
      fact_check_bp: rows.map((row) => row.fact_check_bp),
      ip_hashes: rows.map((row) => row.ip_hash),
      countries: rows.map((row) => row.country),
      cities: rows.map((row) => row.city),
      latitudes: rows.map((row) => row.latitude),
      longitudes: rows.map((row) => row.longitude),
      metadata: rows.map((row) => row.metadata),
    },
  })
}

/** Per-member register results from a delivered batch; skipped members map to null. */
export function splitBatchResult(calls: readonly RegisterCall[], result: unknown): Array<RegisterResultView | null> {
  const parsed = BatchRegisterResultSchema.safeParse(result)
  if (!parsed.success) return calls.map(() => null)

  const byIndex = new Map(parsed.data.items.map((item) => [item.index, item]))
  return calls.map((call, index) => {
    const item = byIndex.get(index)
    if (!item || item.status === "skipped") return null
    return {
      content_hash: call.params.content_hash,
      is_new: item.status === "registered",
      detection_count: item.detection_count,
    }
  })
}
