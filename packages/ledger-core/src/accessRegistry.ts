// =============================================================================
// Access Registry - Node Authorization
// =============================================================================

import type {
  AuthorizeInput,
  IdentityRecord,
  LedgerGenesis,
  OwnershipTransfer,
} from "@faketrace/shared-types"
import type { CallContext } from "./context.js"
import { LedgerError } from "./errors.js"
import { isZeroAddress } from "./hasher.js"

// -----------------------------------------------------------------------------
// Access Registry Interface
// -----------------------------------------------------------------------------

export interface AccessRegistry {
  authorize(ctx: CallContext, input: AuthorizeInput): IdentityRecord
  deauthorize(ctx: CallContext, address: string): IdentityRecord
  transferOwnership(ctx: CallContext, newOwner: string): OwnershipTransfer
  isAuthorized(address: string): boolean
  requireAuthorized(address: string): void
  requireOwner(address: string): void
  activeCount(): number
  owner(): string
  getNode(address: string): IdentityRecord
  listNodes(): IdentityRecord[]
}

// -----------------------------------------------------------------------------
// Create Access Registry
// -----------------------------------------------------------------------------

export function createAccessRegistry(genesis: LedgerGenesis): AccessRegistry {
  const nodes = new Map<string, IdentityRecord>()
  // Enumerable in first-authorization order; records are never removed
  const addresses: string[] = []
  let currentOwner = genesis.owner

  upsertActive(genesis.owner, "genesis-owner", "admin", genesis.timestamp)

  function upsertActive(
    address: string,
    displayName: string,
    nodeClass: IdentityRecord["node_class"],
    now: number
  ): IdentityRecord {
    const existing = nodes.get(address)
    if (!existing) addresses.push(address)

    const record: IdentityRecord = {
      address,
      display_name: displayName,
      node_class: nodeClass,
      authorized_at: now,
      active: true,
      deauthorized_at: null,
    }
    nodes.set(address, record)
    return record
  }

  function isAuthorized(address: string): boolean {
    if (address === currentOwner) return true
    return nodes.get(address)?.active ?? false
  }

  function requireAuthorized(address: string): void {
    if (!isAuthorized(address)) {
      throw new LedgerError("NotAuthorized", "caller is not authorized", { caller: address })
    }
  }

  function requireOwner(address: string): void {
    if (address !== currentOwner) {
      throw new LedgerError("NotOwner", "caller is not owner", { caller: address })
    }
  }

  function authorize(ctx: CallContext, input: AuthorizeInput): IdentityRecord {
    requireOwner(ctx.caller)
    if (isZeroAddress(input.address)) {
      throw new LedgerError("ZeroAddress", "cannot authorize the zero address")
    }
    if (isAuthorized(input.address)) {
      throw new LedgerError("AlreadyAuthorized", "address is already authorized", {
        address: input.address,
      })
    }

    const record = upsertActive(input.address, input.display_name, input.node_class, ctx.now)
    ctx.emit("NodeAuthorized", {
      address: record.address,
      display_name: record.display_name,
      node_class: record.node_class,
    })
    return { ...record }
  }

  function deauthorize(ctx: CallContext, address: string): IdentityRecord {
    requireOwner(ctx.caller)
    if (address === currentOwner) {
      throw new LedgerError("CannotDeauthorizeOwner", "the owner cannot be deauthorized")
    }
    const record = nodes.get(address)
    if (!record || !record.active) {
      throw new LedgerError("NotAuthorized", "address is not authorized", { address })
    }

    const updated: IdentityRecord = { ...record, active: false, deauthorized_at: ctx.now }
    nodes.set(address, updated)
    ctx.emit("NodeDeauthorized", { address })
    return { ...updated }
  }

  function transferOwnership(ctx: CallContext, newOwner: string): OwnershipTransfer {
    requireOwner(ctx.caller)
    if (isZeroAddress(newOwner)) {
      throw new LedgerError("ZeroAddress", "new owner must not be the zero address")
    }

    const previousOwner = currentOwner
    const autoAuthorized = !(nodes.get(newOwner)?.active ?? false)
    if (autoAuthorized) {
      const record = upsertActive(newOwner, "owner", "admin", ctx.now)
      ctx.emit("NodeAuthorized", {
        address: record.address,
        display_name: record.display_name,
        node_class: record.node_class,
      })
    }
    currentOwner = newOwner
    ctx.emit("OwnershipTransferred", { previous_owner: previousOwner, new_owner: newOwner })

    return { previous_owner: previousOwner, new_owner: newOwner, auto_authorized: autoAuthorized }
  }

  // Linear scan; registries hold tens of nodes
  function activeCount(): number {
    let count = 0
    for (const address of addresses) {
      if (nodes.get(address)?.active) count++
    }
    return count
  }

  function getNode(address: string): IdentityRecord {
    const record = nodes.get(address)
    if (!record) {
      throw new LedgerError("NotFound", "node not found", { address })
    }
    return { ...record }
  }

  function listNodes(): IdentityRecord[] {
    return addresses.flatMap((address) => {
      const record = nodes.get(address)
      return record ? [{ ...record }] : []
    })
  }

  return {
    authorize,
    deauthorize,
    transferOwnership,
    isAuthorized,
    requireAuthorized,
    requireOwner,
    activeCount,
    owner: () => currentOwner,
    getNode,
    listNodes,
  }
}
