import { callSigningMessage, toBytes32 } from "@faketrace/ledger-core"
import { type LedgerCall, LedgerCallSchema } from "@faketrace/shared-types"
import type { LocalAccount } from "viem"

export const OWNER = "0x00000000000000000000000000000000000000a1"
export const NODE = "0x00000000000000000000000000000000000000b1"
export const STRANGER = "0x00000000000000000000000000000000000000c1"

export const VIDEO = toBytes32("video-1")
export const IP = toBytes32("ip-1")

export const AUTHORIZE_NODE: LedgerCall = {
  method: "authorize",
  params: { address: NODE, display_name: "edge-1", node_class: "edge" },
}

export function registerCall(contentHash = VIDEO, confidence = 8500): LedgerCall {
  return {
    method: "registerVideo",
    params: {
      content_hash: contentHash,
      perceptual_hash: "phash",
      is_deepfake: true,
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

/** A clock the test moves by hand. */
export function createManualClock(start: number) {
  let now = start
  return {
    now: () => now,
    set: (value: number) => {
      now = value
    },
  }
}

/** Signs a call the way an edge node does, after the server's own parsing. */
export function signCall(account: LocalAccount, call: unknown, requestId: string | null = null): Promise<string> {
  return account.signMessage({ message: callSigningMessage(LedgerCallSchema.parse(call), requestId) })
}
