// =============================================================================
// FakeTrace - Ledger Service Database
// =============================================================================

import pg from "pg"
import { createLogger } from "./logger.js"

const { Pool } = pg
const log = createLogger("db")

export interface Database {
  pool: pg.Pool
  query<T extends pg.QueryResultRow = Record<string, unknown>>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<T>>
  queryOne<T extends pg.QueryResultRow = Record<string, unknown>>(
    text: string,
    params?: unknown[]
  ): Promise<T | null>
  queryAll<T extends pg.QueryResultRow = Record<string, unknown>>(
    text: string,
    params?: unknown[]
  ): Promise<T[]>
  checkHealth(): Promise<boolean>
  close(): Promise<void>
}

export function createDatabase(connectionString: string): Database {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  })

  pool.on("error", (err) => {
    log.error({ err }, "Database pool error")
  })

  async function query<T extends pg.QueryResultRow = Record<string, unknown>>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<T>> {
    return pool.query<T>(text, params)
  }

  return {
    pool,
    query,
    async queryOne<T extends pg.QueryResultRow = Record<string, unknown>>(text: string, params?: unknown[]) {
      const result = await query<T>(text, params)
      return result.rows[0] ?? null
    },
    async queryAll<T extends pg.QueryResultRow = Record<string, unknown>>(text: string, params?: unknown[]) {
      const result = await query<T>(text, params)
      return result.rows
    },
    async checkHealth() {
      try {
        await query("SELECT 1")
        return true
      } catch (err) {
        log.warn({ err }, "Database health check failed")
        return false
      }
    },
    async close() {
      await pool.end()
    },
  }
}
