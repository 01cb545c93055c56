// =============================================================================
// Video Ledger - First-Write Provenance Records
// =============================================================================

import type {
  BatchItemResult,
  BatchRegisterInput,
  BatchRegisterResult,
  LedgerStats,
  Page,
  RegisterResult,
  RegisterVideoInput,
  VideoRecord,
} from "@faketrace/shared-types"
import type { AccessRegistry } from "./accessRegistry.js"
import { type CallContext, paginate, requireBasisPoints, requireNonZeroHash } from "./context.js"
import { LedgerError } from "./errors.js"
import { isZeroHash } from "./hasher.js"

export const MAX_BATCH_SIZE = 50

// -----------------------------------------------------------------------------
// Video Ledger Interface
// -----------------------------------------------------------------------------

export interface VideoLedger {
  register(ctx: CallContext, input: RegisterVideoInput): RegisterResult
  batchRegister(ctx: CallContext, batch: BatchRegisterInput): BatchRegisterResult
  get(contentHash: string): VideoRecord
  isRegistered(contentHash: string): boolean
  getDetectionCount(contentHash: string): number
  findSimilar(perceptualHash: string): string[]
  stats(): LedgerStats
  listHashes(offset: number, limit: number): Page<string>
}

// -----------------------------------------------------------------------------
// Create Video Ledger
// -----------------------------------------------------------------------------

export function createVideoLedger(registry: AccessRegistry): VideoLedger {
  const videos = new Map<string, VideoRecord>()
  const hashes: string[] = []
  const perceptualIndex = new Map<string, string[]>()
  let deepfakeCount = 0
  let authenticCount = 0

  function validateScores(input: Pick<RegisterVideoInput, "confidence_bp" | "lipsync_bp" | "fact_check_bp">) {
    requireBasisPoints(input.confidence_bp, "confidence_bp")
    requireBasisPoints(input.lipsync_bp, "lipsync_bp")
    requireBasisPoints(input.fact_check_bp, "fact_check_bp")
  }

  // Assumes the input is already validated; never throws
  function apply(ctx: CallContext, input: RegisterVideoInput): RegisterResult {
    const existing = videos.get(input.content_hash)

    if (existing) {
      // Verdict fields stay as first written; only the counters move
      existing.last_seen_at = ctx.now
      existing.detection_count += 1
      ctx.emit("VideoRedetected", {
        content_hash: existing.content_hash,
        detection_count: existing.detection_count,
        ip_hash: input.ip_hash,
        country: input.country,
        city: input.city,
        reporter: ctx.caller,
      })
      return {
        content_hash: existing.content_hash,
        is_new: false,
        detection_count: existing.detection_count,
      }
    }

    const record: VideoRecord = {
      content_hash: input.content_hash,
      perceptual_hash: input.perceptual_hash,
      is_deepfake: input.is_deepfake,
      confidence_bp: input.confidence_bp,
      lipsync_bp: input.lipsync_bp,
      fact_check_bp: input.fact_check_bp,
      first_seen_at: ctx.now,
      last_seen_at: ctx.now,
      detection_count: 1,
      origin_ip_hash: input.ip_hash,
      origin_country: input.country,
      origin_city: input.city,
      origin_latitude: input.latitude,
      origin_longitude: input.longitude,
      first_submitter: ctx.caller,
      metadata: input.metadata,
    }
    videos.set(record.content_hash, record)
    hashes.push(record.content_hash)

    if (record.perceptual_hash !== "") {
      const bucket = perceptualIndex.get(record.perceptual_hash)
      if (bucket) bucket.push(record.content_hash)
      else perceptualIndex.set(record.perceptual_hash, [record.content_hash])
    }

    if (record.is_deepfake) deepfakeCount++
    else authenticCount++

    ctx.emit("VideoRegistered", {
      content_hash: record.content_hash,
      perceptual_hash: record.perceptual_hash,
      is_deepfake: record.is_deepfake,
      confidence_bp: record.confidence_bp,
      submitter: ctx.caller,
    })
    if (record.is_deepfake) {
      ctx.emit("DeepfakeDetected", {
        content_hash: record.content_hash,
        confidence_bp: record.confidence_bp,
        lipsync_bp: record.lipsync_bp,
        fact_check_bp: record.fact_check_bp,
        country: record.origin_country,
        city: record.origin_city,
        latitude: record.origin_latitude,
        longitude: record.origin_longitude,
      })
    } else {
      ctx.emit("AuthenticVideoConfirmed", {
        content_hash: record.content_hash,
        confidence_bp: record.confidence_bp,
        country: record.origin_country,
      })
    }

    return { content_hash: record.content_hash, is_new: true, detection_count: 1 }
  }

  function register(ctx: CallContext, input: RegisterVideoInput): RegisterResult {
    registry.requireAuthorized(ctx.caller)
    requireNonZeroHash(input.content_hash)
    validateScores(input)
    return apply(ctx, input)
  }

  function batchRegister(ctx: CallContext, batch: BatchRegisterInput): BatchRegisterResult {
    registry.requireAuthorized(ctx.caller)

    const size = batch.content_hashes.length
    const columns = [
      batch.perceptual_hashes,
      batch.is_deepfake,
      batch.confidence_bp,
      batch.lipsync_bp,
      batch.fact_check_bp,
      batch.ip_hashes,
      batch.countries,
      batch.cities,
      batch.latitudes,
      batch.longitudes,
      batch.metadata,
    ]
    if (columns.some((column) => column.length !== size)) {
      throw new LedgerError("LengthMismatch", "batch columns must all have the same length", {
        expected: size,
      })
    }
    if (size > MAX_BATCH_SIZE) {
      throw new LedgerError("BatchTooLarge", `batch exceeds ${MAX_BATCH_SIZE} items`, { size })
    }

    const inputs: Array<RegisterVideoInput | null> = []
    for (let i = 0; i < size; i++) {
      const input = rowAt(batch, i)
      if (isZeroHash(input.content_hash)) {
        inputs.push(null)
        continue
      }
      // A bad score anywhere rejects the whole batch before anything is written
      validateScores(input)
      inputs.push(input)
    }

    const items: BatchItemResult[] = []
    let registered = 0
    let redetected = 0
    let skipped = 0

    inputs.forEach((input, index) => {
      if (!input) {
        skipped++
        ctx.emit("BatchItemSkipped", { index, reason: "zero_hash" })
        items.push({
          index,
          content_hash: batch.content_hashes[index] ?? "",
          status: "skipped",
          detection_count: 0,
        })
        return
      }

      const result = apply(ctx, input)
      if (result.is_new) registered++
      else redetected++
      items.push({
        index,
        content_hash: result.content_hash,
        status: result.is_new ? "registered" : "redetected",
        detection_count: result.detection_count,
      })
    })

    return { items, registered, redetected, skipped }
  }

  function get(contentHash: string): VideoRecord {
    const record = videos.get(contentHash)
    if (!record) {
      throw new LedgerError("NotFound", "video not registered", { content_hash: contentHash })
    }
    return { ...record }
  }

  function getDetectionCount(contentHash: string): number {
    return videos.get(contentHash)?.detection_count ?? 0
  }

  function findSimilar(perceptualHash: string): string[] {
    return [...(perceptualIndex.get(perceptualHash) ?? [])]
  }

  function stats(): LedgerStats {
    return {
      total: hashes.length,
      deepfake_count: deepfakeCount,
      authentic_count: authenticCount,
    }
  }

  return {
    register,
    batchRegister,
    get,
    isRegistered: (contentHash) => videos.has(contentHash),
    getDetectionCount,
    findSimilar,
    stats,
    listHashes: (offset, limit) => paginate(hashes, offset, limit),
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function rowAt(batch: BatchRegisterInput, i: number): RegisterVideoInput {
  return {
    content_hash: batch.content_hashes[i] ?? "",
    perceptual_hash: batch.perceptual_hashes[i] ?? "",
    is_deepfake: batch.is_deepfake[i] ?? false,
    confidence_bp: batch.confidence_bp[i] ?? 0,
    lipsync_bp: batch.lipsync_bp[i] ?? 0,
    fact_check_bp: batch.fact_check_bp[i] ?? 0,
    ip_hash: batch.ip_hashes[i] ?? "",
    country: batch.countries[i] ?? "",
    city: batch.cities[i] ?? "",
    latitude: batch.latitudes[i] ?? 0,
    longitude: batch.longitudes[i] ?? 0,
    metadata: batch.metadata[i] ?? "",
  }
}
