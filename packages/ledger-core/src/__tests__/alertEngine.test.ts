import { DEFAULT_ALERT_RULE, ZERO_HASH } from "@faketrace/shared-types"
import { beforeEach, describe, expect, it } from "vitest"
import { createAccessRegistry } from "../accessRegistry.js"
import {
  type AlertEngine,
  createAlertEngine,
  firstDetectionSeverity,
  geoSpreadSeverity,
  reuploadSeverity,
} from "../alertEngine.js"
import {
  GENESIS,
  NODE_A,
  OWNER,
  STRANGER,
  createContext,
  eventTypes,
  expectCode,
  hashOf,
} from "./fixtures.js"

const VIDEO = hashOf("video-1")
const IP = hashOf("ip-1")

describe("severity classification", () => {
  it("grades first detections by confidence", () => {
    expect(firstDetectionSeverity(8000)).toBe("Critical")
    expect(firstDetectionSeverity(7999)).toBe("High")
    expect(firstDetectionSeverity(6000)).toBe("High")
    expect(firstDetectionSeverity(5999)).toBe("Medium")
  })

  it("grades re-uploads by count", () => {
    expect(reuploadSeverity(2)).toBe("Medium")
    expect(reuploadSeverity(5)).toBe("High")
    expect(reuploadSeverity(10)).toBe("Critical")
  })

  it("grades geographic spread by country count", () => {
    expect(geoSpreadSeverity(3)).toBe("High")
    expect(geoSpreadSeverity(10)).toBe("Critical")
  })
})

describe("AlertEngine", () => {
  let engine: AlertEngine

  beforeEach(() => {
    const registry = createAccessRegistry(GENESIS)
    registry.authorize(createContext(OWNER, 1_000).ctx, {
      address: NODE_A,
      display_name: "edge-a",
      node_class: "edge",
    })
    engine = createAlertEngine(registry)
  })

  function firstDetection(now: number, contentHash = VIDEO, confidence = 8500) {
    return engine.triggerFirstDetection(createContext(NODE_A, now).ctx, {
      content_hash: contentHash,
      confidence_bp: confidence,
      country: "US",
      ip_hash: IP,
    })
  }

  describe("triggerFirstDetection", () => {
    it("creates a Critical alert with a readable message", () => {
      const { ctx, events } = createContext(NODE_A, 2_000)

      const outcome = engine.triggerFirstDetection(ctx, {
        content_hash: VIDEO,
        confidence_bp: 8500,
        country: "US",
        ip_hash: IP,
      })

      expect(outcome).toEqual({
        status: "created",
        alert: {
          id: 1,
          content_hash: VIDEO,
          alert_type: "FirstDetection",
          severity: "Critical",
          message: "Deepfake first detected in US with 85.00% confidence",
          created_at: 2_000,
          acknowledged: false,
          acknowledged_by: null,
          acknowledged_at: null,
          trigger_ip_hash: IP,
          trigger_country: "US",
        },
      })
      expect(eventTypes(events)).toEqual(["AlertCreated"])
    })

    it("suppresses a repeat inside the cooldown and allows it after", () => {
      firstDetection(1_000)

      const { ctx, events } = createContext(NODE_A, 1_100)
      const early = engine.triggerFirstDetection(ctx, {
        content_hash: VIDEO,
        confidence_bp: 8500,
        country: "US",
        ip_hash: IP,
      })
      const late = firstDetection(1_301)

      expect(early).toEqual({ status: "suppressed", alert_type: "FirstDetection", reason: "cooldown" })
      expect(eventTypes(events)).toEqual(["AlertSuppressed"])
      expect(late.status).toBe("created")
      expect(late.status === "created" ? late.alert.id : 0).toBe(2)
      expect(engine.totalAlerts()).toBe(2)
    })

    it("applies cooldown per video", () => {
      firstDetection(1_000, hashOf("a"))

      expect(firstDetection(1_001, hashOf("b")).status).toBe("created")
    })

    it("rejects zero hashes and out-of-range confidence", () => {
      expectCode(() => firstDetection(2_000, ZERO_HASH), "ZeroHash")
      expectCode(() => firstDetection(2_000, VIDEO, 10_001), "ScoreOutOfRange")
      expect(engine.totalAlerts()).toBe(0)
    })

    it("rejects unauthorized callers", () => {
      expectCode(
        () =>
          engine.triggerFirstDetection(createContext(STRANGER, 2_000).ctx, {
            content_hash: VIDEO,
            confidence_bp: 8500,
            country: "US",
            ip_hash: IP,
          }),
        "NotAuthorized"
      )
    })
  })

  describe("triggerReupload", () => {
    it("suppresses counts below the rule threshold", () => {
      const outcome = engine.triggerReupload(createContext(NODE_A, 2_000).ctx, {
        content_hash: VIDEO,
        ip_hash: IP,
        reupload_count: 1,
        country: "US",
      })

      expect(outcome).toEqual({ status: "suppressed", alert_type: "Reupload", reason: "below_threshold" })
    })

    it("creates an alert graded by count", () => {
      const outcome = engine.triggerReupload(createContext(NODE_A, 2_000).ctx, {
        content_hash: VIDEO,
        ip_hash: IP,
        reupload_count: 5,
        country: "US",
      })

      expect(outcome.status === "created" ? outcome.alert.severity : null).toBe("High")
    })
  })

  describe("triggerGeoSpread", () => {
    it("fires once the country threshold is reached", () => {
      const ctx = createContext(NODE_A, 2_000).ctx
      const below = engine.triggerGeoSpread(ctx, {
        content_hash: VIDEO,
        from_country: "US",
        to_country: "UK",
        unique_countries: 2,
      })
      const reached = engine.triggerGeoSpread(ctx, {
        content_hash: VIDEO,
        from_country: "UK",
        to_country: "Germany",
        unique_countries: 3,
      })

      expect(below.status).toBe("suppressed")
      expect(reached.status === "created" ? reached.alert : null).toMatchObject({
        severity: "High",
        trigger_country: "Germany",
        trigger_ip_hash: null,
      })
    })
  })

  describe("checkThresholds", () => {
    it("fires on exact multiples of the thresholds", () => {
      const result = engine.checkThresholds(createContext(NODE_A, 2_000).ctx, {
        content_hash: VIDEO,
        detection_count: 10,
        spread_count: 50,
        unique_countries: 4,
      })

      expect(result.detection.status === "created" ? result.detection.alert.severity : null).toBe("High")
      expect(result.viral.status === "created" ? result.viral.alert.severity : null).toBe("Critical")
    })

    it("stays quiet between multiples", () => {
      const result = engine.checkThresholds(createContext(NODE_A, 2_000).ctx, {
        content_hash: VIDEO,
        detection_count: 11,
        spread_count: 0,
        unique_countries: 1,
      })

      expect(result).toEqual({
        detection: { status: "suppressed", alert_type: "DetectionThreshold", reason: "below_threshold" },
        viral: { status: "suppressed", alert_type: "ViralSpread", reason: "below_threshold" },
      })
    })
  })

  describe("rules", () => {
    it("starts with the default global rule and cooldown", () => {
      expect(engine.getGlobalRule()).toEqual(DEFAULT_ALERT_RULE)
      expect(engine.getEffectiveRule(VIDEO)).toEqual(DEFAULT_ALERT_RULE)
      expect(engine.cooldown()).toBe(300)
    })

    it("suppresses every trigger for a video whose rule is disabled", () => {
      const ownerCtx = createContext(OWNER, 1_500).ctx
      engine.setVideoRule(ownerCtx, VIDEO, { ...DEFAULT_ALERT_RULE, enabled: false })

      expect(firstDetection(2_000)).toEqual({
        status: "suppressed",
        alert_type: "FirstDetection",
        reason: "rule_disabled",
      })
      expect(firstDetection(2_000, hashOf("other")).status).toBe("created")

      expect(engine.clearVideoRule(ownerCtx, VIDEO)).toBe(true)
      expect(engine.clearVideoRule(ownerCtx, VIDEO)).toBe(false)
      expect(firstDetection(2_001).status).toBe("created")
    })

    it("restricts administration to the owner", () => {
      const nodeCtx = createContext(NODE_A, 1_500).ctx

      expectCode(() => engine.setGlobalRule(nodeCtx, DEFAULT_ALERT_RULE), "NotOwner")
      expectCode(() => engine.setCooldown(nodeCtx, 10), "NotOwner")
    })

    it("validates rules and cooldowns", () => {
      const ownerCtx = createContext(OWNER, 1_500).ctx

      expectCode(() => engine.setGlobalRule(ownerCtx, { ...DEFAULT_ALERT_RULE, spread_threshold: 0 }), "InvalidRule")
      expectCode(() => engine.setCooldown(ownerCtx, -1), "InvalidCooldown")
      expect(engine.getGlobalRule()).toEqual(DEFAULT_ALERT_RULE)
    })

    it("lets a zero cooldown fire back to back", () => {
      const { ctx, events } = createContext(OWNER, 1_500)
      expect(engine.setCooldown(ctx, 0)).toBe(0)
      expect(events[0]?.data).toEqual({ previous_seconds: 300, seconds: 0 })

      firstDetection(2_000)
      expect(firstDetection(2_000).status).toBe("created")
    })
  })

  describe("acknowledgement", () => {
    beforeEach(() => {
      firstDetection(2_000, hashOf("a"))
      firstDetection(2_000, hashOf("b"))
      firstDetection(2_000, hashOf("c"))
    })

    it("acknowledges an alert once", () => {
      const { ctx, events } = createContext(NODE_A, 2_100)

      const alert = engine.acknowledge(ctx, 2)

      expect(alert).toMatchObject({ id: 2, acknowledged: true, acknowledged_by: NODE_A, acknowledged_at: 2_100 })
      expect(eventTypes(events)).toEqual(["AlertAcknowledged"])
      expect(engine.unacknowledgedCount()).toBe(2)
      expectCode(() => engine.acknowledge(ctx, 2), "AlreadyAcknowledged")
    })

    it("rejects unknown ids", () => {
      const ctx = createContext(NODE_A, 2_100).ctx

      expectCode(() => engine.acknowledge(ctx, 0), "InvalidId")
      expectCode(() => engine.acknowledge(ctx, 4), "InvalidId")
      expectCode(() => engine.getAlert(4), "InvalidId")
    })

    it("acknowledges a batch and skips alerts already handled", () => {
      const ctx = createContext(NODE_A, 2_100).ctx
      engine.acknowledge(ctx, 1)

      const result = engine.batchAcknowledge(ctx, [1, 2, 3])

      expect(result).toEqual({ acknowledged: [2, 3], skipped: [1] })
      expect(engine.unacknowledgedCount()).toBe(0)
    })

    it("rejects a batch containing an unknown id without acknowledging any", () => {
      const ctx = createContext(NODE_A, 2_100).ctx

      expectCode(() => engine.batchAcknowledge(ctx, [1, 99]), "InvalidId")
      expect(engine.unacknowledgedCount()).toBe(3)
    })
  })

  it("lists alerts per video and by page", () => {
    firstDetection(2_000, hashOf("a"))
    firstDetection(2_000, hashOf("b"))
    firstDetection(2_400, hashOf("a"))

    expect(engine.getVideoAlerts(hashOf("a")).map((alert) => alert.id)).toEqual([1, 3])
    expect(engine.listAlerts(0, 2).items.map((alert) => alert.id)).toEqual([1, 2])
    expect(engine.listAlerts(0, 2).total).toBe(3)
  })
})
