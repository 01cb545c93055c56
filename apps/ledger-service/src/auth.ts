// =============================================================================
// FakeTrace - Ledger Service Authentication
// =============================================================================

import { callSigningMessage } from "@faketrace/ledger-core"
import { AddressSchema, type LedgerCall } from "@faketrace/shared-types"
import type { FastifyReply, FastifyRequest } from "fastify"
import { type Hex, isHex, recoverMessageAddress } from "viem"
import { z } from "zod"
import { createLogger } from "./logger.js"

const log = createLogger("auth")

// -----------------------------------------------------------------------------
// Token Validation
// -----------------------------------------------------------------------------

export function createTokenValidator(token: string | undefined) {
  return async function validateToken(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | undefined> {
    // Skip auth if no token configured
    if (!token || request.url === "/health") {
      return undefined
    }

    const authHeader = request.headers.authorization

    if (!authHeader) {
      log.warn({ ip: request.ip }, "Missing authorization header")
      return reply
        .code(401)
        .send({ success: false, error: "Missing authorization header", code: "Unauthenticated" })
    }

    const [scheme, value] = authHeader.split(" ")

    if (scheme !== "Bearer" || !value) {
      log.warn({ ip: request.ip }, "Invalid authorization scheme")
      return reply
        .code(401)
        .send({ success: false, error: "Invalid authorization scheme", code: "Unauthenticated" })
    }

    if (value !== token) {
      log.warn({ ip: request.ip }, "Invalid token")
      return reply.code(403).send({ success: false, error: "Invalid token", code: "Unauthenticated" })
    }

    return undefined
  }
}

// -----------------------------------------------------------------------------
// Caller Context
// -----------------------------------------------------------------------------

export class AuthenticationError extends Error {
  readonly statusCode = 401
  readonly code = "Unauthenticated"

  constructor(message: string) {
    super(message)
    this.name = "AuthenticationError"
  }
}

export interface CallerContext {
  caller: string
  requestId: string | null
}

const SignatureSchema = z.string().refine((value): value is Hex => isHex(value), {
  message: "Signature must be hex",
})

const CallerHeadersSchema = z.object({
  "x-node-address": AddressSchema,
  "x-node-signature": SignatureSchema.optional(),
  "x-request-id": z.string().min(1).max(128).optional(),
})

/**
 * Resolves who is calling. The node signs the canonical (call, request id)
 * pair with its key; the recovered signer must match `x-node-address`.
 */
export async function authenticateCall(
  request: FastifyRequest,
  call: LedgerCall
): Promise<CallerContext> {
  const headers = CallerHeadersSchema.parse(request.headers)
  const caller = headers["x-node-address"]
  const requestId = headers["x-request-id"] ?? null
  const signature = headers["x-node-signature"]

  if (!signature) {
    log.warn({ ip: request.ip, caller }, "Missing node signature")
    throw new AuthenticationError("Missing node signature")
  }

  let signer: string
  try {
    signer = await recoverMessageAddress({
      message: callSigningMessage(call, requestId),
      signature,
    })
  } catch (err) {
    log.warn({ err, ip: request.ip, caller }, "Unreadable node signature")
    throw new AuthenticationError("Invalid node signature")
  }

  if (signer.toLowerCase() !== caller) {
    log.warn({ ip: request.ip, caller, signer }, "Node signature does not match caller")
    throw new AuthenticationError("Node signature does not match caller")
  }

  return { caller, requestId }
}
