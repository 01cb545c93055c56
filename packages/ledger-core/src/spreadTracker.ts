// =============================================================================
// Spread Tracker - Sightings, Derived Counters & Lineage
// =============================================================================

import type {
  LineageRecord,
  Page,
  RecordSpreadInput,
  RegisterLineageInput,
  SpreadEvent,
  SpreadResult,
} from "@faketrace/shared-types"
import type { AccessRegistry } from "./accessRegistry.js"
import { type CallContext, paginate, requireBasisPoints, requireNonZeroHash } from "./context.js"
import { LedgerError } from "./errors.js"
import { compositeKey, countryKey, isZeroHash } from "./hasher.js"

const VIRAL_MILESTONES: ReadonlySet<number> = new Set([10, 50, 100])
const VIRAL_MILESTONE_PERIOD = 500

export function isViralMilestone(spreadCount: number): boolean {
  if (spreadCount <= 0) return false
  return VIRAL_MILESTONES.has(spreadCount) || spreadCount % VIRAL_MILESTONE_PERIOD === 0
}

// -----------------------------------------------------------------------------
// Spread Tracker Interface
// -----------------------------------------------------------------------------

export interface SpreadTracker {
  recordSpread(ctx: CallContext, input: RecordSpreadInput): SpreadResult
  registerLineage(ctx: CallContext, input: RegisterLineageInput): LineageRecord
  traceToRoot(contentHash: string, maxDepth: number): string[]
  getLineage(contentHash: string): LineageRecord
  getChildren(contentHash: string): string[]
  getEvents(contentHash: string): SpreadEvent[]
  getEventsPage(contentHash: string, offset: number, limit: number): Page<SpreadEvent>
  getSpreadCount(contentHash: string): number
  getIpUploadCount(contentHash: string, ipHash: string): number
  getCountryCount(contentHash: string, country: string): number
  getUniqueCountryCount(contentHash: string): number
}

// -----------------------------------------------------------------------------
// Create Spread Tracker
// -----------------------------------------------------------------------------

export function createSpreadTracker(registry: AccessRegistry): SpreadTracker {
  const events = new Map<string, SpreadEvent[]>()
  // Keyed by compositeKey(contentHash, ipHash)
  const ipUploadCount = new Map<string, number>()
  const ipFirstUploadAt = new Map<string, number>()
  // Keyed by compositeKey(contentHash, countryKey(country))
  const countrySeenCount = new Map<string, number>()
  const uniqueCountryCount = new Map<string, number>()
  const lineage = new Map<string, LineageRecord>()

  function recordSpread(ctx: CallContext, input: RecordSpreadInput): SpreadResult {
    registry.requireAuthorized(ctx.caller)
    requireNonZeroHash(input.content_hash)

    const history = events.get(input.content_hash) ?? []
    const previous = history[history.length - 1]

    const event: SpreadEvent = {
      content_hash: input.content_hash,
      index: history.length,
      recorded_at: ctx.now,
      ip_hash: input.ip_hash,
      country: input.country,
      city: input.city,
      latitude: input.latitude,
      longitude: input.longitude,
      platform: input.platform,
      source_url: input.source_url,
      reporter: ctx.caller,
    }
    history.push(event)
    events.set(input.content_hash, history)

    // Same submitter re-upload
    const ipKey = compositeKey(input.content_hash, input.ip_hash)
    const uploadsBefore = ipUploadCount.get(ipKey) ?? 0
    ipUploadCount.set(ipKey, uploadsBefore + 1)

    let sameIpReupload = false
    let secondsSinceFirst: number | null = null
    if (uploadsBefore === 0) {
      ipFirstUploadAt.set(ipKey, ctx.now)
    } else {
      sameIpReupload = true
      secondsSinceFirst = ctx.now - (ipFirstUploadAt.get(ipKey) ?? ctx.now)
    }

    // Geographic spread
    const countryCounterKey = compositeKey(input.content_hash, countryKey(input.country))
    const sightingsBefore = countrySeenCount.get(countryCounterKey) ?? 0
    countrySeenCount.set(countryCounterKey, sightingsBefore + 1)

    let uniqueCountries = uniqueCountryCount.get(input.content_hash) ?? 0
    let newCountry = false
    let previousCountry: string | null = null
    if (sightingsBefore === 0) {
      uniqueCountries += 1
      uniqueCountryCount.set(input.content_hash, uniqueCountries)
      if (previous && previous.country !== input.country) {
        newCountry = true
        previousCountry = previous.country
      }
    }

    const spreadCount = history.length
    const viralMilestone = isViralMilestone(spreadCount)

    ctx.emit("SpreadRecorded", {
      content_hash: event.content_hash,
      index: event.index,
      ip_hash: event.ip_hash,
      country: event.country,
      city: event.city,
      platform: event.platform,
      source_url: event.source_url,
      reporter: event.reporter,
    })
    if (sameIpReupload) {
      ctx.emit("SameIpReupload", {
        content_hash: event.content_hash,
        ip_hash: event.ip_hash,
        upload_count: uploadsBefore + 1,
        seconds_since_first_upload: secondsSinceFirst ?? 0,
      })
    }
    if (newCountry && previousCountry !== null) {
      ctx.emit("NewLocationSpread", {
        content_hash: event.content_hash,
        previous_country: previousCountry,
        new_country: event.country,
        city: event.city,
        unique_countries: uniqueCountries,
      })
    }
    if (viralMilestone) {
      ctx.emit("ViralSpreadWarning", {
        content_hash: event.content_hash,
        spread_count: spreadCount,
        unique_countries: uniqueCountries,
      })
    }

    return {
      content_hash: event.content_hash,
      spread_count: spreadCount,
      same_ip_reupload: sameIpReupload,
      reupload_count: uploadsBefore + 1,
      seconds_since_first_upload: secondsSinceFirst,
      new_country: newCountry,
      previous_country: previousCountry,
      unique_countries: uniqueCountries,
      viral_milestone: viralMilestone,
    }
  }

  function registerLineage(ctx: CallContext, input: RegisterLineageInput): LineageRecord {
    registry.requireAuthorized(ctx.caller)
    if (isZeroHash(input.child_hash)) {
      throw new LedgerError("ZeroChildHash", "child_hash must not be the zero hash")
    }
    if (input.child_hash === input.parent_hash) {
      throw new LedgerError("SelfReference", "a video cannot be its own parent", {
        content_hash: input.child_hash,
      })
    }
    if (input.similarity_bp !== null) {
      requireBasisPoints(input.similarity_bp, "similarity_bp")
    }
    if (lineage.has(input.child_hash)) {
      throw new LedgerError("AlreadyRegistered", "lineage already registered", {
        content_hash: input.child_hash,
      })
    }

    const isRoot = isZeroHash(input.parent_hash)
    const parent = isRoot ? undefined : lineage.get(input.parent_hash)
    // Derived from the parent when the ledger knows it; otherwise the caller's claim stands
    const generation = isRoot ? 0 : parent ? parent.generation + 1 : input.generation

    const record: LineageRecord = {
      content_hash: input.child_hash,
      parent_hash: input.parent_hash,
      generation,
      mutations: [...input.mutations],
      similarity_bp: input.similarity_bp,
      children: [],
      registered_at: ctx.now,
      registered_by: ctx.caller,
    }
    lineage.set(record.content_hash, record)
    parent?.children.push(record.content_hash)

    ctx.emit("LineageRegistered", {
      content_hash: record.content_hash,
      parent_hash: record.parent_hash,
      generation: record.generation,
      mutations: [...record.mutations],
      similarity_bp: record.similarity_bp,
    })
    return copyLineage(record)
  }

  /**
   * Ancestors of `contentHash`, nearest first. Stops after a parent that is the
   * zero hash or has no lineage record of its own, or after `maxDepth` hops.
   */
  function traceToRoot(contentHash: string, maxDepth: number): string[] {
    const ancestors: string[] = []
    const budget = Math.max(0, Math.floor(maxDepth))
    let current = contentHash

    while (ancestors.length < budget) {
      const record = lineage.get(current)
      if (!record || isZeroHash(record.parent_hash)) break
      ancestors.push(record.parent_hash)
      current = record.parent_hash
    }

    return ancestors
  }

  function getLineage(contentHash: string): LineageRecord {
    const record = lineage.get(contentHash)
    if (!record) {
      throw new LedgerError("NotFound", "lineage not registered", { content_hash: contentHash })
    }
    return copyLineage(record)
  }

  function getEvents(contentHash: string): SpreadEvent[] {
    return (events.get(contentHash) ?? []).map((event) => ({ ...event }))
  }

  return {
    recordSpread,
    registerLineage,
    traceToRoot,
    getLineage,
    getChildren: (contentHash) => [...(lineage.get(contentHash)?.children ?? [])],
    getEvents,
    getEventsPage: (contentHash, offset, limit) => paginate(getEvents(contentHash), offset, limit),
    getSpreadCount: (contentHash) => events.get(contentHash)?.length ?? 0,
    getIpUploadCount: (contentHash, ipHash) =>
      ipUploadCount.get(compositeKey(contentHash, ipHash)) ?? 0,
    getCountryCount: (contentHash, country) =>
      countrySeenCount.get(compositeKey(contentHash, countryKey(country))) ?? 0,
    getUniqueCountryCount: (contentHash) => uniqueCountryCount.get(contentHash) ?? 0,
  }
}

function copyLineage(record: LineageRecord): LineageRecord {
  return { ...record, mutations: [...record.mutations], children: [...record.children] }
}
