// =============================================================================
// FakeTrace - Durable Outbox
// =============================================================================

import { randomUUID } from "node:crypto"
import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { LedgerCallSchema, type LedgerCall } from "@faketrace/shared-types"
import { z } from "zod"
import { createLogger } from "./logger.js"

const log = createLogger("outbox")

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export const OutboxItemSchema = z.object({
  id: z.string().min(1),
  request_id: z.string().min(1).max(128),
  call: LedgerCallSchema,
  status: z.enum(["pending", "failed"]),
  attempts: z.number().int().nonnegative(),
  next_attempt_at: z.number().int().nonnegative(),
  last_error: z.string().nullable(),
  created_at: z.number().int().nonnegative(),
  /** Set once an entry has been sent inside a batch; retries resend the same batch. */
  batch_key: z.string().nullable().default(null),
  /** Never batched again after its batch was rejected. */
  solo: z.boolean().default(false),
})
export type OutboxItem = z.infer<typeof OutboxItemSchema>

export interface Outbox {
  init(): Promise<void>
  /** `requestId` defaults to the new entry's id. */
  enqueue(call: LedgerCall, now?: number, requestId?: string): Promise<OutboxItem>
  get(id: string): Promise<OutboxItem | null>
  /** Pending entries whose next attempt is due, oldest first. */
  listDue(now: number): Promise<OutboxItem[]>
  listPending(): Promise<OutboxItem[]>
  listFailed(): Promise<OutboxItem[]>
  save(item: OutboxItem): Promise<void>
  remove(id: string): Promise<void>
  /** Moves every failed entry back to pending, due at `now`. Returns how many moved. */
  requeueFailed(now?: number): Promise<number>
}

// -----------------------------------------------------------------------------
// File Outbox
// -----------------------------------------------------------------------------

/**
 * One JSON file per entry. Writes go through a temp file and rename so a crash
 * never leaves a half-written entry behind.
 */
export function createFileOutbox(dir: string): Outbox {
  const fileFor = (id: string) => join(dir, `${id}.json`)
  let counter = 0

  async function init(): Promise<void> {
    await mkdir(dir, { recursive: true })
  }

  async function save(item: OutboxItem): Promise<void> {
    const target = fileFor(item.id)
    const temp = `${target}.tmp`
    await writeFile(temp, JSON.stringify(item, null, 2), "utf-8")
    await rename(temp, target)
  }

  async function enqueue(call: LedgerCall, now: number = Date.now(), requestId?: string): Promise<OutboxItem> {
    // Zero-padded timestamp and counter first so file names sort in creation order
    counter++
    const id = `${String(now).padStart(15, "0")}-${String(counter).padStart(9, "0")}-${randomUUID()}`
    const item: OutboxItem = {
      id,
      request_id: requestId ?? id,
      call: LedgerCallSchema.parse(call),
      status: "pending",
      attempts: 0,
      next_attempt_at: now,
      last_error: null,
      created_at: now,
      batch_key: null,
      solo: false,
    }
    await save(item)
    log.debug({ id, method: call.method }, "Call queued")
    return item
  }

  async function read(file: string): Promise<OutboxItem | null> {
    let raw: string
    try {
      raw = await readFile(join(dir, file), "utf-8")
    } catch (err) {
      // Removed between listing and reading
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null
      throw err
    }

    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (err) {
      log.error({ file, err }, "Corrupt outbox entry skipped")
      return null
    }

    const parsed = OutboxItemSchema.safeParse(data)
    if (!parsed.success) {
      log.error({ file, issues: parsed.error.issues }, "Unreadable outbox entry skipped")
      return null
    }
    return parsed.data
  }

  async function listAll(): Promise<OutboxItem[]> {
    const files = (await readdir(dir)).filter((file) => file.endsWith(".json")).sort()
    const items: OutboxItem[] = []
    for (const file of files) {
      const item = await read(file)
      if (item) items.push(item)
    }
    return items
  }

  async function requeueFailed(now: number = Date.now()): Promise<number> {
    const failed = (await listAll()).filter((item) => item.status === "failed")
    for (const item of failed) {
      await save({ ...item, status: "pending", attempts: 0, next_attempt_at: now })
    }
    if (failed.length > 0) {
      log.info({ count: failed.length }, "Failed calls requeued")
    }
    return failed.length
  }

  return {
    init,
    enqueue,
    async get(id) {
      return read(`${id}.json`)
    },
    async listDue(now) {
      const items = await listAll()
      return items.filter((item) => item.status === "pending" && item.next_attempt_at <= now)
    },
    async listPending() {
      return (await listAll()).filter((item) => item.status === "pending")
    },
    async listFailed() {
      return (await listAll()).filter((item) => item.status === "failed")
    },
    save,
    async remove(id) {
      await rm(fileFor(id), { force: true })
    },
    requeueFailed,
  }
}
