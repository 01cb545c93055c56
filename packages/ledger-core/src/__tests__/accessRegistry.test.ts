import { describe, expect, it } from "vitest"
import { createAccessRegistry } from "../accessRegistry.js"
import {
  GENESIS,
  NODE_A,
  NODE_B,
  OWNER,
  STRANGER,
  createContext,
  eventTypes,
  expectCode,
} from "./fixtures.js"

describe("AccessRegistry", () => {
  it("starts with the owner authorized and counted", () => {
    const registry = createAccessRegistry(GENESIS)

    expect(registry.owner()).toBe(OWNER)
    expect(registry.isAuthorized(OWNER)).toBe(true)
    expect(registry.activeCount()).toBe(1)
    expect(registry.getNode(OWNER).display_name).toBe("genesis-owner")
  })

  it("authorizes a node and emits NodeAuthorized", () => {
    const registry = createAccessRegistry(GENESIS)
    const { ctx, events } = createContext(OWNER, 1_100)

    const record = registry.authorize(ctx, { address: NODE_A, display_name: "edge-a", node_class: "edge" })

    expect(record).toEqual({
      address: NODE_A,
      display_name: "edge-a",
      node_class: "edge",
      authorized_at: 1_100,
      active: true,
      deauthorized_at: null,
    })
    expect(registry.isAuthorized(NODE_A)).toBe(true)
    expect(registry.activeCount()).toBe(2)
    expect(eventTypes(events)).toEqual(["NodeAuthorized"])
  })

  it("rejects authorization from a non-owner", () => {
    const registry = createAccessRegistry(GENESIS)
    const { ctx, events } = createContext(STRANGER, 1_100)

    expectCode(() => registry.authorize(ctx, { address: NODE_A, display_name: "a", node_class: "edge" }), "NotOwner")
    expect(registry.isAuthorized(NODE_A)).toBe(false)
    expect(events).toHaveLength(0)
  })

  it("rejects the zero address and duplicate authorization", () => {
    const registry = createAccessRegistry(GENESIS)
    const { ctx } = createContext(OWNER, 1_100)

    expectCode(
      () => registry.authorize(ctx, { address: `0x${"0".repeat(40)}`, display_name: "z", node_class: "edge" }),
      "ZeroAddress"
    )
    registry.authorize(ctx, { address: NODE_A, display_name: "a", node_class: "edge" })
    expectCode(
      () => registry.authorize(ctx, { address: NODE_A, display_name: "a", node_class: "edge" }),
      "AlreadyAuthorized"
    )
  })

  it("deauthorizes a node and keeps its record", () => {
    const registry = createAccessRegistry(GENESIS)
    const { ctx } = createContext(OWNER, 1_100)
    registry.authorize(ctx, { address: NODE_A, display_name: "a", node_class: "edge" })

    const { ctx: later, events } = createContext(OWNER, 1_200)
    const record = registry.deauthorize(later, NODE_A)

    expect(record.active).toBe(false)
    expect(record.deauthorized_at).toBe(1_200)
    expect(registry.isAuthorized(NODE_A)).toBe(false)
    expect(registry.activeCount()).toBe(1)
    expect(registry.listNodes().map((node) => node.address)).toEqual([OWNER, NODE_A])
    expect(eventTypes(events)).toEqual(["NodeDeauthorized"])
  })

  it("checks deauthorization errors in order", () => {
    const registry = createAccessRegistry(GENESIS)
    const { ctx: strangerCtx } = createContext(STRANGER, 1_100)
    const { ctx } = createContext(OWNER, 1_100)

    expectCode(() => registry.deauthorize(strangerCtx, OWNER), "NotOwner")
    expectCode(() => registry.deauthorize(ctx, OWNER), "CannotDeauthorizeOwner")
    expectCode(() => registry.deauthorize(ctx, NODE_B), "NotAuthorized")
  })

  it("reactivates a previously deauthorized address", () => {
    const registry = createAccessRegistry(GENESIS)
    const { ctx } = createContext(OWNER, 1_100)
    registry.authorize(ctx, { address: NODE_A, display_name: "a", node_class: "edge" })
    registry.deauthorize(ctx, NODE_A)

    const record = registry.authorize(ctx, { address: NODE_A, display_name: "a2", node_class: "aggregator" })

    expect(record.active).toBe(true)
    expect(record.display_name).toBe("a2")
    expect(registry.listNodes()).toHaveLength(2)
  })

  it("transfers ownership and auto-authorizes the new owner", () => {
    const registry = createAccessRegistry(GENESIS)
    const { ctx, events } = createContext(OWNER, 1_100)

    const transfer = registry.transferOwnership(ctx, NODE_B)

    expect(transfer).toEqual({ previous_owner: OWNER, new_owner: NODE_B, auto_authorized: true })
    expect(registry.owner()).toBe(NODE_B)
    expect(registry.isAuthorized(NODE_B)).toBe(true)
    expect(eventTypes(events)).toEqual(["NodeAuthorized", "OwnershipTransferred"])
    expectCode(() => registry.authorize(ctx, { address: NODE_A, display_name: "a", node_class: "edge" }), "NotOwner")
  })

  it("reports missing nodes as NotFound", () => {
    const registry = createAccessRegistry(GENESIS)
    expectCode(() => registry.getNode(NODE_A), "NotFound")
  })
})
