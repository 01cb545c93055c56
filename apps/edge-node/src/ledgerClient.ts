// =============================================================================
// FakeTrace - Ledger Client
// =============================================================================

import { callSigningMessage } from "@faketrace/ledger-core"
import { ALREADY_DONE_CODES, type LedgerCall, LedgerErrorCodeSchema } from "@faketrace/shared-types"
import { type Dispatcher, request } from "undici"
import type { LocalAccount } from "viem"
import { z } from "zod"
import { createLogger } from "./logger.js"

const log = createLogger("ledger-client")

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type DeliveryResult =
  | {
      status: "delivered"
      sequence: number | null
      /** Null when the ledger reported the transition as already done. */
      result: unknown
      replayed: boolean
      already_done: boolean
    }
  | { status: "rejected"; code: string; message: string; sequence: number | null }
  | { status: "transient"; message: string }

export interface LedgerClient {
  submit(call: LedgerCall, requestId: string): Promise<DeliveryResult>
}

export interface LedgerClientOptions {
  baseUrl: string
  /** Node key; every call is signed with it. */
  account: LocalAccount
  apiToken?: string | undefined
  timeoutMs: number
  dispatcher?: Dispatcher
}

const SuccessResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({
    sequence: z.number().int(),
    replayed: z.boolean(),
    result: z.unknown(),
  }),
})

const FailureResponseSchema = z.object({
  success: z.literal(false),
  error: z.string(),
  code: z.string(),
  data: z.object({ sequence: z.number().int() }).optional(),
})

const ResponseSchema = z.union([SuccessResponseSchema, FailureResponseSchema])

// -----------------------------------------------------------------------------
// HTTP Client
// -----------------------------------------------------------------------------

export function createLedgerClient(options: LedgerClientOptions): LedgerClient {
  const url = `${options.baseUrl.replace(/\/+$/, "")}/calls`
  const nodeAddress = options.account.address.toLowerCase()

  async function submit(call: LedgerCall, requestId: string): Promise<DeliveryResult> {
    const signature = await options.account.signMessage({
      message: callSigningMessage(call, requestId),
    })
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
      "x-node-address": nodeAddress,
      "x-node-signature": signature,
      "x-request-id": requestId,
    }
    if (options.apiToken) {
      headers.Authorization = `Bearer ${options.apiToken}`
    }

    let statusCode: number
    let body: unknown
    try {
      const requestOptions: Parameters<typeof request>[1] = {
        method: "POST",
        headers,
        body: JSON.stringify(call),
        headersTimeout: options.timeoutMs,
        bodyTimeout: options.timeoutMs,
      }
      if (options.dispatcher) {
        requestOptions.dispatcher = options.dispatcher
      }
      const response = await request(url, requestOptions)
      statusCode = response.statusCode
      body = await response.body.json()
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      log.warn({ url, requestId, error: message }, "Ledger unreachable")
      return { status: "transient", message }
    }

    if (statusCode >= 500 || statusCode === 429) {
      return { status: "transient", message: `ledger responded with ${statusCode}` }
    }

    const parsed = ResponseSchema.safeParse(body)
    if (!parsed.success) {
      return { status: "transient", message: `unexpected ledger response (${statusCode})` }
    }

    const payload = parsed.data
    if (payload.success) {
      return {
        status: "delivered",
        sequence: payload.data.sequence,
        result: payload.data.result,
        replayed: payload.data.replayed,
        already_done: false,
      }
    }

    if (payload.code === "InvalidRequest") {
      return { status: "rejected", code: payload.code, message: payload.error, sequence: null }
    }
    const code = LedgerErrorCodeSchema.safeParse(payload.code)
    if (!code.success) {
      // Token refusals are configuration problems, not ledger verdicts
      return { status: "transient", message: `${payload.code}: ${payload.error}` }
    }
    if (ALREADY_DONE_CODES.has(code.data)) {
      return {
        status: "delivered",
        sequence: payload.data?.sequence ?? null,
        result: null,
        replayed: false,
        already_done: true,
      }
    }
    return {
      status: "rejected",
      code: code.data,
      message: payload.error,
      sequence: payload.data?.sequence ?? null,
    }
  }

  return { submit }
}
