import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { toBytes32 } from "@faketrace/ledger-core"
import type { LedgerCall } from "@faketrace/shared-types"
import type { DeliveryResult, LedgerClient } from "../ledgerClient.js"
import { type Outbox, createFileOutbox } from "../outbox.js"
import type { RetryConfig } from "../retry.js"

export const VIDEO_A = toBytes32("video-a")
export const VIDEO_B = toBytes32("video-b")
export const VIDEO_C = toBytes32("video-c")
export const IP = toBytes32("ip-1")

export const RETRY: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
}

export function registerCall(contentHash: string, isDeepfake = true, confidence = 8500): LedgerCall {
  return {
    method: "registerVideo",
    params: {
      content_hash: contentHash,
      perceptual_hash: "phash",
      is_deepfake: isDeepfake,
      confidence_bp: confidence,
      lipsync_bp: 0,
      fact_check_bp: 0,
      ip_hash: IP,
      country: "US",
      city: "",
      latitude: 0,
      longitude: 0,
      metadata: "",
    },
  }
}

export function spreadCall(contentHash: string, country = "US"): LedgerCall {
  return {
    method: "recordSpread",
    params: {
      content_hash: contentHash,
      ip_hash: IP,
      country,
      city: "",
      latitude: 0,
      longitude: 0,
      platform: "",
      source_url: "",
    },
  }
}

export interface SentCall {
  call: LedgerCall
  requestId: string
}

/** A ledger client whose answers the test decides call by call. */
export function createScriptedClient(respond: (call: LedgerCall, requestId: string) => DeliveryResult) {
  const sent: SentCall[] = []
  const client: LedgerClient = {
    async submit(call, requestId) {
      sent.push({ call, requestId })
      return respond(call, requestId)
    },
  }
  return { client, sent }
}

export function delivered(result: unknown, sequence = 1): DeliveryResult {
  return { status: "delivered", sequence, result, replayed: false, already_done: false }
}

export const UNREACHABLE: DeliveryResult = { status: "transient", message: "connect ECONNREFUSED" }

/** A file outbox in a fresh temporary directory. */
export async function createTempOutbox(): Promise<{ outbox: Outbox; dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "faketrace-outbox-"))
  const outbox = createFileOutbox(dir)
  await outbox.init()
  return { outbox, dir, cleanup: () => rm(dir, { recursive: true, force: true }) }
}

/** A clock the test moves by hand. */
export function createManualClock(start: number) {
  let now = start
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms
    },
  }
}
