// =============================================================================
// FakeTrace - Edge Node Configuration
// =============================================================================

import { type Hex, isHex } from "viem"
import { privateKeyToAccount } from "viem/accounts"
import { z } from "zod"

// -----------------------------------------------------------------------------
// Environment Schema
// -----------------------------------------------------------------------------

const EnvSchema = z.object({
  // Local intake server
  PORT: z.coerce.number().int().positive().default(3200),
  HOST: z.string().default("127.0.0.1"),

  // Ledger
  LEDGER_URL: z.string().url().default("http://localhost:3100"),
  // Signs every call; the ledger knows this node by the derived address
  NODE_PRIVATE_KEY: z
    .string()
    .regex(/^0x[0-9a-fA-F]{64}$/, "expected a 0x-prefixed 32-byte key")
    .refine((value): value is Hex => isHex(value)),
  LEDGER_API_TOKEN: z.string().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // Outbox
  OUTBOX_DIR: z.string().default("./.outbox"),
  IP_HASH_SALT: z.string().min(1),

  // Retry
  MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  RETRY_DELAY_MS: z.coerce.number().int().positive().default(2000),
  MAX_RETRY_DELAY_MS: z.coerce.number().int().positive().default(60000),

  // Batching
  BATCH_SIZE: z.coerce.number().int().min(1).max(50).default(20),
  FLUSH_CRON: z.string().default("*/30 * * * * *"),

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
export const nodeAccount = privateKeyToAccount(env.NODE_PRIVATE_KEY)
