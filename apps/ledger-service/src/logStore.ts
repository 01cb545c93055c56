// =============================================================================
// FakeTrace - Ledger Log Store
// =============================================================================

import {
  type LedgerGenesis,
  LedgerGenesisSchema,
  type LogEntry,
  LogEntrySchema,
} from "@faketrace/shared-types"
import type { Database } from "./db.js"
import { createLogger } from "./logger.js"

const log = createLogger("log-store")

// -----------------------------------------------------------------------------
// Log Store Interface
// -----------------------------------------------------------------------------

/**
 * Durable home of the call log. Entries are written before they execute and
 * never updated; the in-memory ledger is rebuilt from them on start.
 */
export interface LogStore {
  init(): Promise<void>
  loadGenesis(): Promise<LedgerGenesis | null>
  saveGenesis(genesis: LedgerGenesis): Promise<void>
  append(entry: LogEntry): Promise<void>
  readAll(): Promise<LogEntry[]>
  readRange(fromSequence: number, limit: number): Promise<LogEntry[]>
  checkHealth(): Promise<boolean>
  close(): Promise<void>
}

// -----------------------------------------------------------------------------
// Postgres Store
// -----------------------------------------------------------------------------

interface LogRow {
  sequence: string
  timestamp: string
  caller: string
  request_id: string | null
  call: unknown
  prev_digest: string
  digest: string
}

interface GenesisRow {
  owner: string
  timestamp: string
}

// BIGINT columns come back as strings
function rowToEntry(row: LogRow): LogEntry {
  return LogEntrySchema.parse({
    sequence: Number(row.sequence),
    timestamp: Number(row.timestamp),
    caller: row.caller,
    request_id: row.request_id,
    call: row.call,
    prev_digest: row.prev_digest,
    digest: row.digest,
  })
}

export function createPgLogStore(db: Database): LogStore {
  async function init(): Promise<void> {
    await db.query(`
      CREATE TABLE IF NOT EXISTS ledger_genesis (
        id SMALLINT PRIMARY KEY DEFAULT 1 CHECK (id = 1),
        owner TEXT NOT NULL,
        timestamp BIGINT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `)
    await db.query(`
      CREATE TABLE IF NOT EXISTS ledger_log (
        sequence BIGINT PRIMARY KEY,
        timestamp BIGINT NOT NULL,
        caller TEXT NOT NULL,
        request_id TEXT,
        call JSONB NOT NULL,
        prev_digest TEXT NOT NULL,
        digest TEXT NOT NULL UNIQUE,
        recorded_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `)
    await db.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS ledger_log_request_idx
       ON ledger_log (caller, request_id) WHERE request_id IS NOT NULL`
    )
    log.info("Ledger tables ready")
  }

  async function loadGenesis(): Promise<LedgerGenesis | null> {
    const row = await db.queryOne<GenesisRow>(`SELECT owner, timestamp FROM ledger_genesis WHERE id = 1`)
    if (!row) return null
    return LedgerGenesisSchema.parse({ owner: row.owner, timestamp: Number(row.timestamp) })
  }

  async function saveGenesis(genesis: LedgerGenesis): Promise<void> {
    await db.query(`INSERT INTO ledger_genesis (id, owner, timestamp) VALUES (1, $1, $2)`, [
      genesis.owner,
      genesis.timestamp,
    ])
  }

  async function append(entry: LogEntry): Promise<void> {
    await db.query(
      `INSERT INTO ledger_log (sequence, timestamp, caller, request_id, call, prev_digest, digest)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        entry.sequence,
        entry.timestamp,
        entry.caller,
        entry.request_id,
        JSON.stringify(entry.call),
        entry.prev_digest,
        entry.digest,
      ]
    )
  }

  async function readAll(): Promise<LogEntry[]> {
    const rows = await db.queryAll<LogRow>(`SELECT * FROM ledger_log ORDER BY sequence ASC`)
    return rows.map(rowToEntry)
  }

  async function readRange(fromSequence: number, limit: number): Promise<LogEntry[]> {
    const rows = await db.queryAll<LogRow>(
      `SELECT * FROM ledger_log WHERE sequence >= $1 ORDER BY sequence ASC LIMIT $2`,
      [fromSequence, limit]
    )
    return rows.map(rowToEntry)
  }

  return {
    init,
    loadGenesis,
    saveGenesis,
    append,
    readAll,
    readRange,
    checkHealth: () => db.checkHealth(),
    close: () => db.close(),
  }
}

// -----------------------------------------------------------------------------
// In-Memory Store
// -----------------------------------------------------------------------------

/** Used when no DATABASE_URL is configured, and by tests. Nothing survives a restart. */
export function createMemoryLogStore(seed: { genesis?: LedgerGenesis; entries?: LogEntry[] } = {}): LogStore {
  let genesis: LedgerGenesis | null = seed.genesis ?? null
  const entries: LogEntry[] = [...(seed.entries ?? [])]

  return {
    async init() {},
    async loadGenesis() {
      return genesis
    },
    async saveGenesis(value) {
      if (genesis) throw new Error("Genesis already recorded")
      genesis = value
    },
    async append(entry) {
      const last = entries[entries.length - 1]
      if (entry.sequence !== (last?.sequence ?? 0) + 1) {
        throw new Error(`Log append out of order at sequence ${entry.sequence}`)
      }
      entries.push(entry)
    },
    async readAll() {
      return [...entries]
    },
    async readRange(fromSequence, limit) {
      return entries.filter((entry) => entry.sequence >= fromSequence).slice(0, limit)
    },
    async checkHealth() {
      return true
    },
    async close() {},
  }
}
