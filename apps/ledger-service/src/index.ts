// =============================================================================
// FakeTrace - Ledger Service Entrypoint
// =============================================================================

import { buildServer } from "./app.js"
import { env } from "./config.js"
import { createDatabase } from "./db.js"
import { logger } from "./logger.js"
import { type LogStore, createMemoryLogStore, createPgLogStore } from "./logStore.js"
import { createNotifier, createWebhookDelivery } from "./notifier.js"
import { createLedgerRuntime, resolveGenesis } from "./runtime.js"

async function main() {
  logger.info({ port: env.PORT, host: env.HOST }, "Starting ledger service")

  let store: LogStore
  if (env.DATABASE_URL) {
    const db = createDatabase(env.DATABASE_URL)
    if (!(await db.checkHealth())) {
      logger.error("Database connection failed")
      process.exit(1)
    }
    logger.info("Database connection verified")
    store = createPgLogStore(db)
  } else {
    logger.warn("DATABASE_URL not set; the ledger log lives in memory and is lost on restart")
    store = createMemoryLogStore()
  }
  await store.init()

  const genesis = await resolveGenesis(store, env.LEDGER_OWNER_ADDRESS)
  const runtime = createLedgerRuntime({ store, genesis })
  await runtime.start()

  // Attached after replay so historical events are not re-sent
  const notifier = env.ALERT_WEBHOOK_URL
    ? createNotifier({
        minSeverity: env.NOTIFY_MIN_SEVERITY,
        deliver: createWebhookDelivery(env.ALERT_WEBHOOK_URL, env.NOTIFY_TIMEOUT_MS),
      })
    : null
  const detach = notifier?.attach(runtime.ledger.events)

  const app = await buildServer({ runtime, store, apiToken: env.LEDGER_API_TOKEN })
  await app.listen({ port: env.PORT, host: env.HOST })
  logger.info({ port: env.PORT, owner: genesis.owner, sequence: runtime.head().sequence }, "Ledger service started")

  // Graceful shutdown
  const shutdown = async () => {
    logger.info("Shutting down...")
    await app.close()
    detach?.()
    await notifier?.drain()
    await store.close()
    logger.info("Shutdown complete")
    process.exit(0)
  }

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed")
      process.exit(1)
    })
  }
  process.on("SIGINT", onSignal)
  process.on("SIGTERM", onSignal)
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Ledger service failed to start")
  process.exit(1)
})
