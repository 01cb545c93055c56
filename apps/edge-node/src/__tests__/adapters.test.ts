import { toBytes32 } from "@faketrace/ledger-core"
import { ZERO_HASH } from "@faketrace/shared-types"
import { describe, expect, it } from "vitest"
import {
  detectionToCall,
  hashContent,
  hashIp,
  lineageToCall,
  sightingToCall,
  toBasisPoints,
  toFixedPoint,
} from "../adapters.js"
import { VIDEO_A, VIDEO_B } from "./helpers.js"

describe("scalar conversions", () => {
  it("hashes IPs with the salt and never returns the raw address", () => {
    const hashed = hashIp("203.0.113.7", "test-salt")
    expect(hashed).toBe(toBytes32("test-salt:203.0.113.7"))
    expect(hashIp(" 203.0.113.7 ", "test-salt")).toBe(hashed)
    expect(hashIp("203.0.113.7", "other-salt")).not.toBe(hashed)
  })

  it("hashes raw content with SHA-256", () => {
    expect(hashContent(new TextEncoder().encode("abc"))).toBe(
      "0xba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    )
  })

  it("converts fractions to basis points", () => {
    expect(toBasisPoints(0)).toBe(0)
    expect(toBasisPoints(0.5)).toBe(5000)
    expect(toBasisPoints(1)).toBe(10_000)
  })

  it("rejects fractions outside [0, 1]", () => {
    expect(() => toBasisPoints(1.5)).toThrow(RangeError)
    expect(() => toBasisPoints(-0.1)).toThrow(RangeError)
    expect(() => toBasisPoints(Number.NaN)).toThrow(RangeError)
  })

  it("scales degrees by one million", () => {
    expect(toFixedPoint(37.7749)).toBe(37_774_900)
    expect(toFixedPoint(-122.4194)).toBe(-122_419_400)
  })
})

describe("detectionToCall", () => {
  it("builds a registration with hashed IP and scaled values", () => {
    const call = detectionToCall(
      {
        content_hash: `0x${VIDEO_A.slice(2).toUpperCase()}`,
        is_deepfake: true,
        confidence: 0.5,
        country: "DE",
        city: "Berlin",
        latitude: 52.52,
        longitude: 13.405,
        uploader_ip: "203.0.113.7",
        metadata: { source: "upload-form" },
      },
      "test-salt"
    )

    expect(call).toEqual({
      method: "registerVideo",
      params: {
        content_hash: VIDEO_A,
        perceptual_hash: "",
        is_deepfake: true,
        confidence_bp: 5000,
        lipsync_bp: 0,
        fact_check_bp: 0,
        ip_hash: toBytes32("test-salt:203.0.113.7"),
        country: "DE",
        city: "Berlin",
        latitude: 52_520_000,
        longitude: 13_405_000,
        metadata: '{"source":"upload-form"}',
      },
    })
  })

  it("leaves metadata empty when none is given", () => {
    const call = detectionToCall(
      { content_hash: VIDEO_A, is_deepfake: false, confidence: 0.25, country: "US", uploader_ip: "10.0.0.1" },
      "test-salt"
    )
    expect(call.method).toBe("registerVideo")
    if (call.method !== "registerVideo") return
    expect(call.params.metadata).toBe("")
    expect(call.params.confidence_bp).toBe(2500)
  })

  it("rejects scores above one", () => {
    expect(() =>
      detectionToCall(
        { content_hash: VIDEO_A, is_deepfake: true, confidence: 1.2, country: "US", uploader_ip: "10.0.0.1" },
        "test-salt"
      )
    ).toThrow()
  })
})

describe("sightingToCall", () => {
  it("builds a spread record", () => {
    const call = sightingToCall(
      { content_hash: VIDEO_A, uploader_ip: "10.0.0.1", country: "FR", platform: "video-site" },
      "test-salt"
    )
    expect(call).toEqual({
      method: "recordSpread",
      params: {
        content_hash: VIDEO_A,
        ip_hash: toBytes32("test-salt:10.0.0.1"),
        country: "FR",
        city: "",
        latitude: 0,
        longitude: 0,
        platform: "video-site",
        source_url: "",
      },
    })
  })
})

describe("lineageToCall", () => {
  it("defaults to a root with no similarity", () => {
    expect(lineageToCall({ child_hash: VIDEO_A })).toEqual({
      method: "registerLineage",
      params: {
        child_hash: VIDEO_A,
        parent_hash: ZERO_HASH,
        generation: 0,
        mutations: [],
        similarity_bp: null,
      },
    })
  })

  it("converts similarity to basis points", () => {
    const call = lineageToCall({
      child_hash: VIDEO_B,
      parent_hash: VIDEO_A,
      generation: 1,
      mutations: ["crop"],
      similarity: 0.5,
    })
    expect(call.method === "registerLineage" && call.params.similarity_bp).toBe(5000)
  })
})
