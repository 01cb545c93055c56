// =============================================================================
// FakeTrace - Detector Input Adapters
// =============================================================================

import { createHash } from "node:crypto"
import { toBytes32 } from "@faketrace/ledger-core"
import {
  Bytes32Schema,
  COORDINATE_SCALE,
  type LedgerCall,
  MAX_BASIS_POINTS,
  ZERO_HASH,
} from "@faketrace/shared-types"
import { z } from "zod"

// -----------------------------------------------------------------------------
// Scalar Conversions
// -----------------------------------------------------------------------------

/** Raw IPs never leave the node; the ledger only sees this salted digest. */
export function hashIp(ip: string, salt: string): string {
  return toBytes32(`${salt}:${ip.trim()}`)
}

/** SHA-256 of the raw video bytes as a ledger content hash. */
export function hashContent(data: Uint8Array): string {
  return `0x${createHash("sha256").update(data).digest("hex")}`
}

export function toBasisPoints(fraction: number): number {
  if (!Number.isFinite(fraction) || fraction < 0 || fraction > 1) {
    throw new RangeError(`score must be a fraction in [0, 1], got ${fraction}`)
  }
  return Math.round(fraction * MAX_BASIS_POINTS)
}

export function toFixedPoint(degrees: number): number {
  return Math.round(degrees * COORDINATE_SCALE)
}

// -----------------------------------------------------------------------------
// Detector Reports
// -----------------------------------------------------------------------------

const FractionSchema = z.number().min(0).max(1)

const LocationSchema = z.object({
  country: z.string().max(256),
  city: z.string().max(256).default(""),
  latitude: z.number().min(-90).max(90).default(0),
  longitude: z.number().min(-180).max(180).default(0),
})

export const DetectionReportSchema = LocationSchema.extend({
  content_hash: Bytes32Schema,
  perceptual_hash: z.string().max(256).default(""),
  is_deepfake: z.boolean(),
  confidence: FractionSchema,
  lipsync_score: FractionSchema.default(0),
  fact_check_score: FractionSchema.default(0),
  uploader_ip: z.string().min(1),
  metadata: z.record(z.unknown()).default({}),
})
export type DetectionReport = z.input<typeof DetectionReportSchema>

export const SightingReportSchema = LocationSchema.extend({
  content_hash: Bytes32Schema,
  uploader_ip: z.string().min(1),
  platform: z.string().max(256).default(""),
  source_url: z.string().max(2048).default(""),
})
export type SightingReport = z.input<typeof SightingReportSchema>

export const LineageReportSchema = z.object({
  child_hash: Bytes32Schema,
  parent_hash: Bytes32Schema.default(ZERO_HASH),
  generation: z.number().int().nonnegative().default(0),
  mutations: z.array(z.string().max(256)).max(32).default([]),
  similarity: FractionSchema.nullable().default(null),
})
export type LineageReport = z.input<typeof LineageReportSchema>

// -----------------------------------------------------------------------------
// Report -> Ledger Call
// -----------------------------------------------------------------------------

export function detectionToCall(report: DetectionReport, salt: string): LedgerCall {
  const parsed = DetectionReportSchema.parse(report)
  return {
    method: "registerVideo",
    params: {
      content_hash: parsed.content_hash,
      perceptual_hash: parsed.perceptual_hash,
      is_deepfake: parsed.is_deepfake,
      confidence_bp: toBasisPoints(parsed.confidence),
      lipsync_bp: toBasisPoints(parsed.lipsync_score),
      fact_check_bp: toBasisPoints(parsed.fact_check_score),
      ip_hash: hashIp(parsed.uploader_ip, salt),
      country: parsed.country,
      city: parsed.city,
      latitude: toFixedPoint(parsed.latitude),
      longitude: toFixedPoint(parsed.longitude),
      metadata: Object.keys(parsed.metadata).length > 0 ? JSON.stringify(parsed.metadata) : "",
    },
  }
}

export function sightingToCall(report: SightingReport, salt: string): LedgerCall {
  const parsed = SightingReportSchema.parse(report)
  return {
    method: "recordSpread",
    params: {
      content_hash: parsed.content_hash,
      ip_hash: hashIp(parsed.uploader_ip, salt),
      country: parsed.country,
      city: parsed.city,
      latitude: toFixedPoint(parsed.latitude),
      longitude: toFixedPoint(parsed.longitude),
      platform: parsed.platform,
      source_url: parsed.source_url,
    },
  }
}

export function lineageToCall(report: LineageReport): LedgerCall {
  const parsed = LineageReportSchema.parse(report)
  return {
    method: "registerLineage",
    params: {
      child_hash: parsed.child_hash,
      parent_hash: parsed.parent_hash,
      generation: parsed.generation,
      mutations: parsed.mutations,
      similarity_bp: parsed.similarity === null ? null : toBasisPoints(parsed.similarity),
    },
  }
}
