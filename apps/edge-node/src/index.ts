// =============================================================================
// FakeTrace - Edge Node Entrypoint
// =============================================================================

import { CronJob } from "cron"
import { env, nodeAccount } from "./config.js"
import { createLedgerClient } from "./ledgerClient.js"
import { logger } from "./logger.js"
import { createEdgeNode } from "./node.js"
import { createFileOutbox } from "./outbox.js"
import { DEFAULT_RETRY_CONFIG } from "./retry.js"
import { buildServer } from "./server.js"
import { createSubmitter } from "./submitter.js"

async function main() {
  logger.info({ ledger: env.LEDGER_URL, outbox: env.OUTBOX_DIR }, "Starting edge node")

  const outbox = createFileOutbox(env.OUTBOX_DIR)
  await outbox.init()

  const client = createLedgerClient({
    baseUrl: env.LEDGER_URL,
    account: nodeAccount,
    apiToken: env.LEDGER_API_TOKEN,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
  })
  const submitter = createSubmitter({
    outbox,
    client,
    batchSize: env.BATCH_SIZE,
    retry: {
      ...DEFAULT_RETRY_CONFIG,
      maxAttempts: env.MAX_ATTEMPTS,
      initialDelayMs: env.RETRY_DELAY_MS,
      maxDelayMs: env.MAX_RETRY_DELAY_MS,
    },
  })
  const node = createEdgeNode({ outbox, submitter, ipHashSalt: env.IP_HASH_SALT })

  const backlog = await node.status()
  logger.info({ pending: backlog.pending, failed: backlog.failed }, "Outbox loaded")

  const flushJob = new CronJob(env.FLUSH_CRON, () => {
    node.flush().catch((err: unknown) => {
      logger.error({ err }, "Scheduled flush failed")
    })
  })
  flushJob.start()
  logger.info({ cron: env.FLUSH_CRON }, "Scheduled flushing started")

  const app = buildServer(node)
  await app.listen({ port: env.PORT, host: env.HOST })
  logger.info({ port: env.PORT }, "Edge node started")

  // Graceful shutdown
  const shutdown = async () => {
    logger.info("Shutting down...")
    flushJob.stop()
    await app.close()
    // Whatever is still undelivered stays in the outbox for the next start
    await node.flush()
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
  logger.fatal({ err }, "Edge node failed to start")
  process.exit(1)
})
