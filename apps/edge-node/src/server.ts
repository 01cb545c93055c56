// =============================================================================
// FakeTrace - Edge Node Intake API
// =============================================================================

import Fastify, { type FastifyInstance } from "fastify"
import { ZodError } from "zod"
import { DetectionReportSchema, LineageReportSchema, SightingReportSchema } from "./adapters.js"
import { createLogger } from "./logger.js"
import type { EdgeNode, ReportStatus } from "./node.js"
import type { FlushReport } from "./submitter.js"

const log = createLogger("server")

function statusCodeFor(status: ReportStatus): number {
  switch (status.status) {
    case "confirmed":
      return 200
    case "pending":
      return 202
    case "rejected":
      return 422
  }
}

function summarize(report: FlushReport) {
  return {
    attempted: report.attempted,
    delivered: report.delivered,
    rescheduled: report.rescheduled,
    failed: report.failed,
    follow_ups: report.follow_ups,
  }
}

/** Local endpoint the detector pipeline posts its verdicts to. */
export function buildServer(node: EdgeNode): FastifyInstance {
  const app = Fastify({
    logger: false, // We use our own logger
  })

  app.setErrorHandler((err, request, reply) => {
    if (err instanceof ZodError || err instanceof RangeError) {
      return reply.code(400).send({
        success: false,
        error: "Invalid report",
        code: "InvalidRequest",
        details: err instanceof ZodError ? err.issues : err.message,
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

  app.get("/health", async () => {
    return { status: "healthy", timestamp: new Date().toISOString() }
  })

  app.get("/status", async () => {
    return { success: true, data: await node.status() }
  })

  app.post("/detections", async (request, reply) => {
    const status = await node.reportDetection(DetectionReportSchema.parse(request.body))
    reply.code(statusCodeFor(status))
    return { success: status.status !== "rejected", data: status }
  })

  app.post("/sightings", async (request, reply) => {
    const status = await node.reportSighting(SightingReportSchema.parse(request.body))
    reply.code(statusCodeFor(status))
    return { success: status.status !== "rejected", data: status }
  })

  app.post("/lineage", async (request, reply) => {
    const status = await node.reportLineage(LineageReportSchema.parse(request.body))
    reply.code(statusCodeFor(status))
    return { success: status.status !== "rejected", data: status }
  })

  app.post("/flush", async () => {
    const report = await node.flush()
    return { success: true, data: summarize(report) }
  })

  app.post("/retry-failed", async () => {
    const { requeued, report } = await node.requeueFailed()
    return { success: true, data: { requeued, ...summarize(report) } }
  })

  return app
}
