import type {
  LedgerEventPayloads,
  LedgerEventType,
  LedgerGenesis,
  RegisterVideoInput,
} from "@faketrace/shared-types"
import { expect } from "vitest"
import type { CallContext } from "../context.js"
import { isLedgerError } from "../errors.js"
import { toBytes32 } from "../hasher.js"

// ============================================================================
// TEST FIXTURES
// ============================================================================

export const OWNER = `0x${"a1".padStart(40, "0")}`
export const NODE_A = `0x${"b1".padStart(40, "0")}`
export const NODE_B = `0x${"b2".padStart(40, "0")}`
export const STRANGER = `0x${"c1".padStart(40, "0")}`

export const GENESIS: LedgerGenesis = { owner: OWNER, timestamp: 1_000 }

export function hashOf(label: string): string {
  return toBytes32(label)
}

export interface RecordedEvent {
  type: LedgerEventType
  data: LedgerEventPayloads[LedgerEventType]
}

export function createContext(caller: string, now: number): { ctx: CallContext; events: RecordedEvent[] } {
  const events: RecordedEvent[] = []
  const ctx: CallContext = {
    caller,
    now,
    emit: (type, data) => {
      events.push({ type, data })
    },
  }
  return { ctx, events }
}

export function eventTypes(events: RecordedEvent[]): LedgerEventType[] {
  return events.map((event) => event.type)
}

export function createRegisterInput(overrides: Partial<RegisterVideoInput> = {}): RegisterVideoInput {
  return {
    content_hash: hashOf("video-1"),
    perceptual_hash: "phash-1",
    is_deepfake: true,
    confidence_bp: 8500,
    lipsync_bp: 7000,
    fact_check_bp: 6000,
    ip_hash: hashOf("ip-1"),
    country: "US",
    city: "Austin",
    latitude: 30_267_153,
    longitude: -97_743_061,
    metadata: "",
    ...overrides,
  }
}

export function expectCode(fn: () => unknown, code: string): void {
  try {
    fn()
  } catch (err) {
    expect(isLedgerError(err)).toBe(true)
    if (isLedgerError(err)) expect(err.code).toBe(code)
    return
  }
  throw new Error(`expected ${code} to be thrown`)
}
