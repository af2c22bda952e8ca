import { Schema } from "effect"
import { OwnerId } from "./Aggregate.js"

export const Role = Schema.Literal("ADMIN", "CUSTOMER")
export type Role = typeof Role.Type

/**
 * The caller on whose behalf a core operation runs. Passed explicitly to every
 * operation that checks ownership.
 */
export class Requester extends Schema.Class<Requester>("Requester")({
  userId: OwnerId,
  role: Role
}) {
  get isAdmin(): boolean {
    return this.role === "ADMIN"
  }
}

export const IdentityHeaders = Schema.Struct({
  "x-user-id": OwnerId,
  "x-user-role": Schema.optionalWith(Role, { default: () => "CUSTOMER" as const })
})
