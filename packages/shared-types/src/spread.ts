// =============================================================================
// FakeTrace - Spread & Lineage Types
// =============================================================================

import { z } from "zod"
import {
  AddressSchema,
  BasisPointsSchema,
  Bytes32Schema,
  LatitudeSchema,
  LongitudeSchema,
  ShortTextSchema,
  UnixSecondsSchema,
} from "./schemas.js"

// -----------------------------------------------------------------------------
// Spread Events
// -----------------------------------------------------------------------------

export const RecordSpreadInputSchema = z.object({
  content_hash: Bytes32Schema,
  ip_hash: Bytes32Schema,
  country: ShortTextSchema,
  city: ShortTextSchema.default(""),
  latitude: LatitudeSchema.default(0),
  longitude: LongitudeSchema.default(0),
  platform: ShortTextSchema.default(""),
  source_url: z.string().max(2048).default(""),
})
export type RecordSpreadInput = z.infer<typeof RecordSpreadInputSchema>

export const SpreadEventSchema = z.object({
  content_hash: Bytes32Schema,
  index: z.number().int().nonnegative(),
  recorded_at: UnixSecondsSchema,
  ip_hash: Bytes32Schema,
  country: z.string(),
  city: z.string(),
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
  platform: z.string(),
  source_url: z.string(),
  reporter: AddressSchema,
})
export type SpreadEvent = z.infer<typeof SpreadEventSchema>

export interface SpreadResult {
  content_hash: string
  spread_count: number
  same_ip_reupload: boolean
  reupload_count: number
  seconds_since_first_upload: number | null
  new_country: boolean
  previous_country: string | null
  unique_countries: number
  viral_milestone: boolean
}

// -----------------------------------------------------------------------------
// Lineage
// -----------------------------------------------------------------------------

export const RegisterLineageInputSchema = z.object({
  child_hash: Bytes32Schema,
  parent_hash: Bytes32Schema,
  generation: z.number().int().nonnegative().default(0),
  mutations: z.array(ShortTextSchema).max(32).default([]),
  similarity_bp: BasisPointsSchema.nullable().default(null),
})
export type RegisterLineageInput = z.infer<typeof RegisterLineageInputSchema>

export const LineageRecordSchema = z.object({
  content_hash: Bytes32Schema,
  parent_hash: Bytes32Schema,
  generation: z.number().int().nonnegative(),
  mutations: z.array(z.string()),
  similarity_bp: BasisPointsSchema.nullable(),
  children: z.array(Bytes32Schema),
  registered_at: UnixSecondsSchema,
  registered_by: AddressSchema,
})
export type LineageRecord = z.infer<typeof LineageRecordSchema>
