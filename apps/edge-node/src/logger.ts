// =============================================================================
// FakeTrace - Edge Node Logging
// =============================================================================

import pino from "pino"
import { env, nodeAccount } from "./config.js"

const loggerOptions = {
  level: env.LOG_LEVEL,
  base: {
    service: "edge-node",
    node: nodeAccount.address.toLowerCase(),
  },
}

// Pretty printing in development only
export const logger = pino(
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test"
    ? {
        ...loggerOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      }
    : loggerOptions
)

export function createLogger(module: string) {
  return logger.child({ module })
}
