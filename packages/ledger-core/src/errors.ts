// =============================================================================
// Ledger Errors
// =============================================================================

import {
  LEDGER_ERROR_CATEGORY,
  type LedgerErrorCategory,
  type LedgerErrorCode,
  type LedgerErrorInfo,
} from "@faketrace/shared-types"

/**
 * Raised by every ledger operation that rejects a call. Operations check all
 * preconditions before touching state, so a thrown LedgerError always means
 * nothing changed.
 */
export class LedgerError extends Error {
  readonly category: LedgerErrorCategory

  constructor(
    readonly code: LedgerErrorCode,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message)
    this.name = "LedgerError"
    this.category = LEDGER_ERROR_CATEGORY[code]
    Object.setPrototypeOf(this, LedgerError.prototype)
  }

  toInfo(): LedgerErrorInfo {
    return { code: this.code, category: this.category, message: this.message }
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError
}
