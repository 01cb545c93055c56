// =============================================================================
// FakeTrace - Ledger Service Configuration
// =============================================================================

import { AddressSchema, SeveritySchema } from "@faketrace/shared-types"
import { z } from "zod"

// -----------------------------------------------------------------------------
// Environment Schema
// -----------------------------------------------------------------------------

const EnvSchema = z.object({
  // Database (in-memory log when unset)
  DATABASE_URL: z.string().url().optional(),

  // Server
  PORT: z.coerce.number().default(3100),
  HOST: z.string().default("0.0.0.0"),

  // Ledger
  LEDGER_OWNER_ADDRESS: AddressSchema,

  // Auth
  LEDGER_API_TOKEN: z.string().optional(),

  // Notifications
  ALERT_WEBHOOK_URL: z.string().url().optional(),
  NOTIFY_MIN_SEVERITY: SeveritySchema.default("Medium"),
  NOTIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // Logging
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "silent"]).default("info"),
})

export type Env = z.infer<typeof EnvSchema>

function loadEnv(): Env {
  const result = EnvSchema.safeParse(process.env)
  if (!result.success) {
    console.error("Invalid environment configuration:")
    console.error(result.error.format())
    process.exit(1)
  }
  return result.data
}

export const env = loadEnv()
