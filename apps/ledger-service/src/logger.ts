// =============================================================================
// FakeTrace - Ledger Service Logging
// =============================================================================

import pino from "pino"
import { env } from "./config.js"

const devTransport =
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test"
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined

export const logger = pino({
  level: env.LOG_LEVEL,
  ...(devTransport ? { transport: devTransport } : {}),
  base: {
    service: "ledger-service",
  },
})

export type Logger = typeof logger

export function createLogger(module: string) {
  return logger.child({ module })
}
