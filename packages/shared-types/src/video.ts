// =============================================================================
// FakeTrace - Video Ledger Types
// =============================================================================

import { z } from "zod"
import {
  AddressSchema,
  BasisPointsSchema,
  Bytes32Schema,
  LatitudeSchema,
  LongitudeSchema,
  MetadataSchema,
  ShortTextSchema,
  UnixSecondsSchema,
} from "./schemas.js"

// -----------------------------------------------------------------------------
// Video Record
// -----------------------------------------------------------------------------

export const VideoRecordSchema = z.object({
  content_hash: Bytes32Schema,
  perceptual_hash: z.string(),
  is_deepfake: z.boolean(),
  confidence_bp: BasisPointsSchema,
  lipsync_bp: BasisPointsSchema,
  fact_check_bp: BasisPointsSchema,
  first_seen_at: UnixSecondsSchema,
  last_seen_at: UnixSecondsSchema,
  detection_count: z.number().int().positive(),
  origin_ip_hash: Bytes32Schema,
  origin_country: z.string(),
  origin_city: z.string(),
  origin_latitude: LatitudeSchema,
  origin_longitude: LongitudeSchema,
  first_submitter: AddressSchema,
  metadata: z.string(),
})
export type VideoRecord = z.infer<typeof VideoRecordSchema>

// -----------------------------------------------------------------------------
// Registration
// -----------------------------------------------------------------------------

export const RegisterVideoInputSchema = z.object({
  content_hash: Bytes32Schema,
  perceptual_hash: ShortTextSchema,
  is_deepfake: z.boolean(),
  confidence_bp: BasisPointsSchema,
  lipsync_bp: BasisPointsSchema.default(0),
  fact_check_bp: BasisPointsSchema.default(0),
  ip_hash: Bytes32Schema,
  country: ShortTextSchema,
  city: ShortTextSchema.default(""),
  latitude: LatitudeSchema.default(0),
  longitude: LongitudeSchema.default(0),
  metadata: MetadataSchema.default(""),
})
export type RegisterVideoInput = z.infer<typeof RegisterVideoInputSchema>

export interface RegisterResult {
  content_hash: string
  is_new: boolean
  detection_count: number
}

/**
 * Column-oriented batch, one array per field of a single registration.
 * Every column must have the same length.
 */
export const BatchRegisterInputSchema = z.object({
  content_hashes: z.array(Bytes32Schema),
  perceptual_hashes: z.array(ShortTextSchema),
  is_deepfake: z.array(z.boolean()),
  confidence_bp: z.array(BasisPointsSchema),
  lipsync_bp: z.array(BasisPointsSchema),
  fact_check_bp: z.array(BasisPointsSchema),
  ip_hashes: z.array(Bytes32Schema),
  countries: z.array(ShortTextSchema),
  cities: z.array(ShortTextSchema),
  latitudes: z.array(LatitudeSchema),
  longitudes: z.array(LongitudeSchema),
  metadata: z.array(MetadataSchema),
})
export type BatchRegisterInput = z.infer<typeof BatchRegisterInputSchema>

export const BatchItemStatusSchema = z.enum(["registered", "redetected", "skipped"])
export type BatchItemStatus = z.infer<typeof BatchItemStatusSchema>

export interface BatchItemResult {
  index: number
  content_hash: string
  status: BatchItemStatus
  detection_count: number
}

export interface BatchRegisterResult {
  items: BatchItemResult[]
  registered: number
  redetected: number
  skipped: number
}

export interface LedgerStats {
  total: number
  deepfake_count: number
  authentic_count: number
}
