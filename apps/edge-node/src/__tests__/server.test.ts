import type { FastifyInstance } from "fastify"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { type EdgeNode, PENDING_MESSAGE } from "../node.js"
import { buildServer } from "../server.js"
import { VIDEO_A, VIDEO_B } from "./helpers.js"

function createStubNode(): EdgeNode {
  return {
    reportDetection: vi.fn(async () => ({ request_id: "req-1", status: "pending" as const, message: PENDING_MESSAGE })),
    reportSighting: vi.fn(async () => ({
      request_id: "req-2",
      status: "confirmed" as const,
      sequence: 4,
      already_done: false,
      result: { spread_count: 1 },
    })),
    reportLineage: vi.fn(async () => ({
      request_id: "req-3",
      status: "rejected" as const,
      code: "SelfReference",
      message: "video cannot be its own parent",
    })),
    flush: vi.fn(async () => ({
      attempted: 2,
      delivered: 1,
      rescheduled: 1,
      failed: 0,
      follow_ups: 0,
      outcomes: new Map(),
    })),
    requeueFailed: vi.fn(async () => ({
      requeued: 2,
      report: { attempted: 2, delivered: 2, rescheduled: 0, failed: 0, follow_ups: 1, outcomes: new Map() },
    })),
    status: vi.fn(async () => ({ pending: 1, failed: 0, failures: [] })),
  }
}

describe("edge node intake API", () => {
  let node: EdgeNode
  let app: FastifyInstance

  beforeEach(() => {
    node = createStubNode()
    app = buildServer(node)
  })

  afterEach(async () => {
    await app.close()
  })

  it("accepts a detection and reports it as pending", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/detections",
      payload: {
        content_hash: VIDEO_A,
        is_deepfake: true,
        confidence: 0.92,
        country: "US",
        uploader_ip: "198.51.100.4",
      },
    })

    expect(response.statusCode).toBe(202)
    expect(response.json()).toEqual({
      success: true,
      data: { request_id: "req-1", status: "pending", message: "result pending — confirmation delayed" },
    })
    expect(node.reportDetection).toHaveBeenCalledWith(
      expect.objectContaining({ content_hash: VIDEO_A, city: "", lipsync_score: 0, metadata: {} })
    )
  })

  it("returns confirmed sightings", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/sightings",
      payload: { content_hash: VIDEO_A, uploader_ip: "198.51.100.4", country: "FR" },
    })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toMatchObject({ success: true, data: { status: "confirmed", sequence: 4 } })
  })

  it("returns ledger rejections as unprocessable", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/lineage",
      payload: { child_hash: VIDEO_B, parent_hash: VIDEO_B },
    })

    expect(response.statusCode).toBe(422)
    expect(response.json()).toMatchObject({ success: false, data: { code: "SelfReference" } })
  })

  it("rejects malformed reports before queueing them", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/detections",
      payload: { content_hash: "0x1234", is_deepfake: true, confidence: 2, country: "US", uploader_ip: "1.2.3.4" },
    })

    expect(response.statusCode).toBe(400)
    expect(response.json()).toMatchObject({ success: false, code: "InvalidRequest" })
    expect(node.reportDetection).not.toHaveBeenCalled()
  })

  it("reports outbox status and flushes on demand", async () => {
    const status = await app.inject({ method: "GET", url: "/status" })
    const flush = await app.inject({ method: "POST", url: "/flush" })

    expect(status.json()).toEqual({ success: true, data: { pending: 1, failed: 0, failures: [] } })
    expect(flush.json()).toEqual({
      success: true,
      data: { attempted: 2, delivered: 1, rescheduled: 1, failed: 0, follow_ups: 0 },
    })
  })

  it("requeues failed calls on demand", async () => {
    const response = await app.inject({ method: "POST", url: "/retry-failed" })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({
      success: true,
      data: { requeued: 2, attempted: 2, delivered: 2, rescheduled: 0, failed: 0, follow_ups: 1 },
    })
    expect(node.requeueFailed).toHaveBeenCalledTimes(1)
  })
})
