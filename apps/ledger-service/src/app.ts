// =============================================================================
// FakeTrace - Ledger Service HTTP API
// =============================================================================

import cors from "@fastify/cors"
import { isLedgerError } from "@faketrace/ledger-core"
import {
  AddressSchema,
  Bytes32Schema,
  LEDGER_ERROR_CATEGORY,
  type LedgerCall,
  LedgerCallSchema,
  type LedgerErrorCode,
  PageRequestSchema,
} from "@faketrace/shared-types"
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify"
import { ZodError, z } from "zod"
import { authenticateCall, createTokenValidator } from "./auth.js"
import { createLogger } from "./logger.js"
import type { LogStore } from "./logStore.js"
import type { LedgerRuntime } from "./runtime.js"

const log = createLogger("server")

// -----------------------------------------------------------------------------
// Request Schemas
// -----------------------------------------------------------------------------

const HashParamsSchema = z.object({ hash: Bytes32Schema })
const AddressParamsSchema = z.object({ address: AddressSchema })
const AlertIdParamsSchema = z.object({ id: z.coerce.number().int() })
const PerceptualParamsSchema = z.object({ perceptual: z.string().min(1).max(256) })
const IpParamsSchema = z.object({ hash: Bytes32Schema, ipHash: Bytes32Schema })
const CountryParamsSchema = z.object({ hash: Bytes32Schema, country: z.string().max(256) })

const TraceQuerySchema = z.object({
  max_depth: z.coerce.number().int().min(0).max(256).default(32),
})

const LogQuerySchema = z.object({
  from: z.coerce.number().int().positive().default(1),
  limit: z.coerce.number().int().min(1).max(500).default(100),
})

// -----------------------------------------------------------------------------
// Error Mapping
// -----------------------------------------------------------------------------

export function statusForError(code: LedgerErrorCode): number {
  if (code === "NotFound") return 404
  switch (LEDGER_ERROR_CATEGORY[code]) {
    case "authorization":
      return 403
    case "validation":
      return 400
    case "state_conflict":
      return 409
  }
}

// -----------------------------------------------------------------------------
// Server Setup
// -----------------------------------------------------------------------------

export interface ServerDeps {
  runtime: LedgerRuntime
  store: LogStore
  apiToken?: string | undefined
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { runtime, store } = deps
  const { ledger } = runtime

  const app = Fastify({
    logger: false, // We use our own logger
  })

  await app.register(cors, {
    origin: true,
  })

  // Auth middleware
  app.addHook("preHandler", createTokenValidator(deps.apiToken))

  app.setErrorHandler((err, request, reply) => {
    if (err instanceof ZodError) {
      return reply.code(400).send({
        success: false,
        error: "Invalid request",
        code: "InvalidRequest",
        details: err.issues,
      })
    }
    if (isLedgerError(err)) {
      return reply.code(statusForError(err.code)).send({
        success: false,
        error: err.message,
        code: err.code,
      })
    }
    const status = err.statusCode ?? 500
    if (status >= 500) {
      log.error({ err, url: request.url }, "Request failed")
    }
    return reply.code(status).send({
      success: false,
      error: status >= 500 ? "Internal server error" : err.message,
      code: err.code ?? "InternalError",
    })
  })

  /** Appends a call to the log and reports its outcome. */
  async function submitCall(request: FastifyRequest, reply: FastifyReply, call: LedgerCall) {
    const { caller, requestId } = await authenticateCall(request, call)
    const { entry, outcome, replayed } = await runtime.submit({ caller, request_id: requestId, call })
    const receipt = {
      sequence: entry.sequence,
      timestamp: entry.timestamp,
      digest: entry.digest,
      replayed,
    }

    if (outcome.ok) {
      return { success: true, data: { ...receipt, method: outcome.method, result: outcome.result } }
    }

    reply.code(statusForError(outcome.error.code))
    return {
      success: false,
      error: outcome.error.message,
      code: outcome.error.code,
      data: receipt,
    }
  }

  // ---------------------------------------------------------------------------
  // Health Endpoints
  // ---------------------------------------------------------------------------

  app.get("/health", async () => {
    const dbHealthy = await store.checkHealth()
    const head = runtime.head()

    return {
      status: dbHealthy ? "healthy" : "unhealthy",
      database: dbHealthy,
      sequence: head.sequence,
      digest: head.digest,
    }
  })

  app.get("/ledger", async () => ({
    success: true,
    data: {
      genesis: ledger.genesis,
      owner: ledger.registry.owner(),
      active_nodes: ledger.registry.activeCount(),
      videos: ledger.videos.stats(),
      total_alerts: ledger.alerts.totalAlerts(),
      unacknowledged_alerts: ledger.alerts.unacknowledgedCount(),
      head: runtime.head(),
    },
  }))

  // ---------------------------------------------------------------------------
  // Call Log Endpoints
  // ---------------------------------------------------------------------------

  app.post("/calls", async (request, reply) => submitCall(request, reply, LedgerCallSchema.parse(request.body)))

  app.get("/log", async (request) => {
    const query = LogQuerySchema.parse(request.query)
    return { success: true, data: await store.readRange(query.from, query.limit) }
  })

  // ---------------------------------------------------------------------------
  // Access Registry Endpoints
  // ---------------------------------------------------------------------------

  app.get("/owner", async () => ({ success: true, data: { owner: ledger.registry.owner() } }))

  app.get("/nodes", async () => ({ success: true, data: ledger.registry.listNodes() }))

  app.get("/nodes/count", async () => ({ success: true, data: { active: ledger.registry.activeCount() } }))

  app.get("/nodes/:address", async (request) => {
    const { address } = AddressParamsSchema.parse(request.params)
    return { success: true, data: ledger.registry.getNode(address) }
  })

  app.get("/nodes/:address/authorized", async (request) => {
    const { address } = AddressParamsSchema.parse(request.params)
    return { success: true, data: { authorized: ledger.registry.isAuthorized(address) } }
  })

  app.post("/nodes", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "authorize", params: request.body }))
  )

  app.delete("/nodes/:address", async (request, reply) => {
    const { address } = AddressParamsSchema.parse(request.params)
    return submitCall(request, reply, { method: "deauthorize", params: { address } })
  })

  app.post("/ownership/transfer", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "transferOwnership", params: request.body }))
  )

  // ---------------------------------------------------------------------------
  // Video Ledger Endpoints
  // ---------------------------------------------------------------------------

  app.get("/videos", async (request) => {
    const page = PageRequestSchema.parse(request.query)
    return { success: true, data: ledger.videos.listHashes(page.offset, page.limit) }
  })

  app.get("/videos/stats", async () => ({ success: true, data: ledger.videos.stats() }))

  app.get("/videos/similar/:perceptual", async (request) => {
    const { perceptual } = PerceptualParamsSchema.parse(request.params)
    return { success: true, data: ledger.videos.findSimilar(perceptual) }
  })

  app.get("/videos/:hash", async (request) => {
    const { hash } = HashParamsSchema.parse(request.params)
    return { success: true, data: ledger.videos.get(hash) }
  })

  app.get("/videos/:hash/registered", async (request) => {
    const { hash } = HashParamsSchema.parse(request.params)
    return { success: true, data: { registered: ledger.videos.isRegistered(hash) } }
  })

  app.get("/videos/:hash/detections", async (request) => {
    const { hash } = HashParamsSchema.parse(request.params)
    return { success: true, data: { detection_count: ledger.videos.getDetectionCount(hash) } }
  })

  app.get("/videos/:hash/alerts", async (request) => {
    const { hash } = HashParamsSchema.parse(request.params)
    return { success: true, data: ledger.alerts.getVideoAlerts(hash) }
  })

  app.post("/videos", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "registerVideo", params: request.body }))
  )

  app.post("/videos/batch", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "batchRegisterVideos", params: request.body }))
  )

  // ---------------------------------------------------------------------------
  // Spread Tracker Endpoints
  // ---------------------------------------------------------------------------

  app.post("/spread", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "recordSpread", params: request.body }))
  )

  app.get("/spread/:hash", async (request) => {
    const { hash } = HashParamsSchema.parse(request.params)
    return {
      success: true,
      data: {
        content_hash: hash,
        spread_count: ledger.spread.getSpreadCount(hash),
        unique_countries: ledger.spread.getUniqueCountryCount(hash),
      },
    }
  })

  app.get("/spread/:hash/events", async (request) => {
    const { hash } = HashParamsSchema.parse(request.params)
    const page = PageRequestSchema.parse(request.query)
    return { success: true, data: ledger.spread.getEventsPage(hash, page.offset, page.limit) }
  })

  app.get("/spread/:hash/ip/:ipHash", async (request) => {
    const { hash, ipHash } = IpParamsSchema.parse(request.params)
    return { success: true, data: { upload_count: ledger.spread.getIpUploadCount(hash, ipHash) } }
  })

  app.get("/spread/:hash/countries/:country", async (request) => {
    const { hash, country } = CountryParamsSchema.parse(request.params)
    return { success: true, data: { sightings: ledger.spread.getCountryCount(hash, country) } }
  })

  app.post("/lineage", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "registerLineage", params: request.body }))
  )

  app.get("/lineage/:hash", async (request) => {
    const { hash } = HashParamsSchema.parse(request.params)
    return { success: true, data: ledger.spread.getLineage(hash) }
  })

  app.get("/lineage/:hash/children", async (request) => {
    const { hash } = HashParamsSchema.parse(request.params)
    return { success: true, data: ledger.spread.getChildren(hash) }
  })

  app.get("/lineage/:hash/trace", async (request) => {
    const { hash } = HashParamsSchema.parse(request.params)
    const { max_depth } = TraceQuerySchema.parse(request.query)
    return { success: true, data: ledger.spread.traceToRoot(hash, max_depth) }
  })

  // ---------------------------------------------------------------------------
  // Alert Endpoints
  // ---------------------------------------------------------------------------

  app.post("/alerts/first-detection", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "triggerFirstDetection", params: request.body }))
  )

  app.post("/alerts/reupload", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "triggerReupload", params: request.body }))
  )

  app.post("/alerts/geo-spread", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "triggerGeoSpread", params: request.body }))
  )

  app.post("/alerts/check-thresholds", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "checkThresholds", params: request.body }))
  )

  app.post("/alerts/acknowledge", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "batchAcknowledgeAlerts", params: request.body }))
  )

  app.post("/alerts/:id/acknowledge", async (request, reply) => {
    const { id } = AlertIdParamsSchema.parse(request.params)
    return submitCall(request, reply, { method: "acknowledgeAlert", params: { alert_id: id } })
  })

  app.get("/alerts", async (request) => {
    const page = PageRequestSchema.parse(request.query)
    return { success: true, data: ledger.alerts.listAlerts(page.offset, page.limit) }
  })

  app.get("/alerts/stats", async () => ({
    success: true,
    data: {
      total: ledger.alerts.totalAlerts(),
      unacknowledged: ledger.alerts.unacknowledgedCount(),
    },
  }))

  app.get("/alerts/:id", async (request) => {
    const { id } = AlertIdParamsSchema.parse(request.params)
    return { success: true, data: ledger.alerts.getAlert(id) }
  })

  // ---------------------------------------------------------------------------
  // Alert Rule Endpoints
  // ---------------------------------------------------------------------------

  app.get("/rules/global", async () => ({ success: true, data: ledger.alerts.getGlobalRule() }))

  app.put("/rules/global", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "setGlobalRule", params: { rule: request.body } }))
  )

  app.get("/rules/videos/:hash", async (request) => {
    const { hash } = HashParamsSchema.parse(request.params)
    return { success: true, data: ledger.alerts.getEffectiveRule(hash) }
  })

  app.put("/rules/videos/:hash", async (request, reply) => {
    const { hash } = HashParamsSchema.parse(request.params)
    return submitCall(
      request,
      reply,
      LedgerCallSchema.parse({ method: "setVideoRule", params: { content_hash: hash, rule: request.body } })
    )
  })

  app.delete("/rules/videos/:hash", async (request, reply) => {
    const { hash } = HashParamsSchema.parse(request.params)
    return submitCall(request, reply, { method: "clearVideoRule", params: { content_hash: hash } })
  })

  app.get("/rules/cooldown", async () => ({ success: true, data: { seconds: ledger.alerts.cooldown() } }))

  app.put("/rules/cooldown", async (request, reply) =>
    submitCall(request, reply, LedgerCallSchema.parse({ method: "setCooldown", params: request.body }))
  )

  return app
}
