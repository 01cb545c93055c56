import { type RecordSpreadInput, ZERO_HASH } from "@faketrace/shared-types"
import { beforeEach, describe, expect, it } from "vitest"
import { createAccessRegistry } from "../accessRegistry.js"
import { type SpreadTracker, createSpreadTracker, isViralMilestone } from "../spreadTracker.js"
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

function sighting(overrides: Partial<RecordSpreadInput> = {}): RecordSpreadInput {
  return {
    content_hash: VIDEO,
    ip_hash: hashOf("ip-1"),
    country: "US",
    city: "",
    latitude: 0,
    longitude: 0,
    platform: "",
    source_url: "",
    ...overrides,
  }
}

describe("isViralMilestone", () => {
  it("marks the fixed milestones and multiples of 500", () => {
    expect([10, 50, 100, 500, 1000, 1500].every(isViralMilestone)).toBe(true)
    expect([0, 1, 9, 11, 99, 250, 501].some(isViralMilestone)).toBe(false)
  })
})

describe("SpreadTracker", () => {
  let tracker: SpreadTracker

  beforeEach(() => {
    const registry = createAccessRegistry(GENESIS)
    registry.authorize(createContext(OWNER, 1_000).ctx, {
      address: NODE_A,
      display_name: "edge-a",
      node_class: "edge",
    })
    tracker = createSpreadTracker(registry)
  })

  describe("recordSpread", () => {
    it("appends an event with its index and reporter", () => {
      const { ctx, events } = createContext(NODE_A, 2_000)

      const result = tracker.recordSpread(ctx, sighting({ platform: "video-site", city: "Austin" }))

      expect(result).toEqual({
        content_hash: VIDEO,
        spread_count: 1,
        same_ip_reupload: false,
        reupload_count: 1,
        seconds_since_first_upload: null,
        new_country: false,
        previous_country: null,
        unique_countries: 1,
        viral_milestone: false,
      })
      expect(tracker.getEvents(VIDEO)[0]).toMatchObject({
        index: 0,
        recorded_at: 2_000,
        reporter: NODE_A,
        platform: "video-site",
      })
      expect(eventTypes(events)).toEqual(["SpreadRecorded"])
    })

    it("does not require the video to be registered", () => {
      const { ctx } = createContext(NODE_A, 2_000)

      tracker.recordSpread(ctx, sighting({ content_hash: hashOf("unregistered") }))

      expect(tracker.getSpreadCount(hashOf("unregistered"))).toBe(1)
    })

    it("flags a re-upload from the same IP with the elapsed time", () => {
      tracker.recordSpread(createContext(NODE_A, 2_000).ctx, sighting())
      const { ctx, events } = createContext(NODE_A, 2_090)

      const result = tracker.recordSpread(ctx, sighting())

      expect(result.same_ip_reupload).toBe(true)
      expect(result.reupload_count).toBe(2)
      expect(result.seconds_since_first_upload).toBe(90)
      expect(tracker.getIpUploadCount(VIDEO, hashOf("ip-1"))).toBe(2)
      expect(eventTypes(events)).toEqual(["SpreadRecorded", "SameIpReupload"])
    })

    it("counts unique countries and flags only the first sighting of each", () => {
      const countries = ["US", "US", "UK", "US", "Germany"]
      const results = countries.map((country, i) =>
        tracker.recordSpread(
          createContext(NODE_A, 2_000 + i).ctx,
          sighting({ country, ip_hash: hashOf(`ip-${i}`) })
        )
      )

      expect(results.map((result) => result.new_country)).toEqual([false, false, true, false, true])
      expect(results[2]?.previous_country).toBe("US")
      expect(results[4]?.previous_country).toBe("US")
      expect(tracker.getUniqueCountryCount(VIDEO)).toBe(3)
      expect(tracker.getCountryCount(VIDEO, "US")).toBe(3)
      expect(tracker.getCountryCount(VIDEO, "us")).toBe(0)
    })

    it("warns at the tenth sighting", () => {
      const runs = Array.from({ length: 10 }, (_, i) => {
        const { ctx, events } = createContext(NODE_A, 2_001 + i)
        const result = tracker.recordSpread(ctx, sighting({ ip_hash: hashOf(`ip-${i}`) }))
        return { milestone: result.viral_milestone, types: eventTypes(events) }
      })

      expect(runs.slice(0, 9).some((run) => run.milestone)).toBe(false)
      expect(runs[9]).toEqual({ milestone: true, types: ["SpreadRecorded", "ViralSpreadWarning"] })
    })

    it("rejects zero hashes and unauthorized reporters", () => {
      expectCode(
        () => tracker.recordSpread(createContext(NODE_A, 2_000).ctx, sighting({ content_hash: ZERO_HASH })),
        "ZeroHash"
      )
      expectCode(() => tracker.recordSpread(createContext(STRANGER, 2_000).ctx, sighting()), "NotAuthorized")
      expect(tracker.getSpreadCount(VIDEO)).toBe(0)
    })

    it("pages the event history", () => {
      for (let i = 0; i < 5; i++) {
        tracker.recordSpread(createContext(NODE_A, 2_000 + i).ctx, sighting({ ip_hash: hashOf(`ip-${i}`) }))
      }

      const page = tracker.getEventsPage(VIDEO, 3, 10)

      expect(page.total).toBe(5)
      expect(page.items.map((event) => event.index)).toEqual([3, 4])
    })
  })

  describe("lineage", () => {
    function chain(length: number): string[] {
      const hashes = Array.from({ length: length + 1 }, (_, i) => hashOf(`gen-${i}`))
      const { ctx } = createContext(NODE_A, 3_000)
      tracker.registerLineage(ctx, {
        child_hash: hashes[0] ?? "",
        parent_hash: ZERO_HASH,
        generation: 0,
        mutations: [],
        similarity_bp: null,
      })
      for (let i = 1; i < hashes.length; i++) {
        tracker.registerLineage(ctx, {
          child_hash: hashes[i] ?? "",
          parent_hash: hashes[i - 1] ?? "",
          generation: 0,
          mutations: ["re-encode"],
          similarity_bp: 9000,
        })
      }
      return hashes
    }

    it("derives generations from registered parents", () => {
      const hashes = chain(2)

      expect(tracker.getLineage(hashes[0] ?? "").generation).toBe(0)
      expect(tracker.getLineage(hashes[2] ?? "").generation).toBe(2)
      expect(tracker.getChildren(hashes[0] ?? "")).toEqual([hashes[1]])
    })

    it("keeps the caller's generation when the parent is unknown", () => {
      const { ctx } = createContext(NODE_A, 3_000)

      const record = tracker.registerLineage(ctx, {
        child_hash: hashOf("orphan"),
        parent_hash: hashOf("unknown-parent"),
        generation: 4,
        mutations: ["crop"],
        similarity_bp: null,
      })

      expect(record.generation).toBe(4)
      expect(tracker.traceToRoot(hashOf("orphan"), 5)).toEqual([hashOf("unknown-parent")])
    })

    it("refuses to overwrite an existing lineage record", () => {
      const hashes = chain(1)
      const { ctx } = createContext(NODE_A, 3_100)

      expectCode(
        () =>
          tracker.registerLineage(ctx, {
            child_hash: hashes[1] ?? "",
            parent_hash: hashOf("someone-else"),
            generation: 0,
            mutations: [],
            similarity_bp: null,
          }),
        "AlreadyRegistered"
      )
      expect(tracker.getLineage(hashes[1] ?? "").parent_hash).toBe(hashes[0])
    })

    it("rejects zero and self-referencing children", () => {
      const { ctx } = createContext(NODE_A, 3_000)
      const base = { generation: 0, mutations: [], similarity_bp: null }

      expectCode(
        () => tracker.registerLineage(ctx, { ...base, child_hash: ZERO_HASH, parent_hash: VIDEO }),
        "ZeroChildHash"
      )
      expectCode(() => tracker.registerLineage(ctx, { ...base, child_hash: VIDEO, parent_hash: VIDEO }), "SelfReference")
    })

    it("traces ancestors nearest first within the depth limit", () => {
      const short = chain(3)
      expect(tracker.traceToRoot(short[3] ?? "", 5)).toEqual([short[2], short[1], short[0]])
    })

    it("stops tracing at maxDepth", () => {
      const long = chain(10)

      const ancestors = tracker.traceToRoot(long[10] ?? "", 5)

      expect(ancestors).toEqual([long[9], long[8], long[7], long[6], long[5]])
    })
  })
})
