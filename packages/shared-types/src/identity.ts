// =============================================================================
// FakeTrace - Node Identity Types
// =============================================================================

import { z } from "zod"
import { AddressSchema, ShortTextSchema, UnixSecondsSchema } from "./schemas.js"

export const NodeClassSchema = z.enum(["edge", "aggregator", "admin"])
export type NodeClass = z.infer<typeof NodeClassSchema>

export const IdentityRecordSchema = z.object({
  address: AddressSchema,
  display_name: z.string(),
  node_class: NodeClassSchema,
  authorized_at: UnixSecondsSchema,
  active: z.boolean(),
  deauthorized_at: UnixSecondsSchema.nullable(),
})
export type IdentityRecord = z.infer<typeof IdentityRecordSchema>

export const AuthorizeInputSchema = z.object({
  address: AddressSchema,
  display_name: ShortTextSchema,
  node_class: NodeClassSchema.default("edge"),
})
export type AuthorizeInput = z.infer<typeof AuthorizeInputSchema>

export const DeauthorizeInputSchema = z.object({
  address: AddressSchema,
})
export type DeauthorizeInput = z.infer<typeof DeauthorizeInputSchema>

export const TransferOwnershipInputSchema = z.object({
  new_owner: AddressSchema,
})
export type TransferOwnershipInput = z.infer<typeof TransferOwnershipInputSchema>

export interface OwnershipTransfer {
  previous_owner: string
  new_owner: string
  auto_authorized: boolean
}
