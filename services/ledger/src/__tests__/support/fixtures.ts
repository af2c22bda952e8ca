import { DateTime, Either } from "effect"
import { CapacityHolder, HolderId, type HolderKind } from "../../domain/CapacityHolder.js"
import { OwnerId } from "../../domain/Aggregate.js"
import { Requester } from "../../domain/Identity.js"

export const holderIdA = HolderId.make("550e8400-e29b-41d4-a716-446655440000")
export const holderIdB = HolderId.make("550e8400-e29b-41d4-a716-446655440001")

export const ownerX = OwnerId.make("770e8400-e29b-41d4-a716-446655440002")
export const ownerY = OwnerId.make("770e8400-e29b-41d4-a716-446655440003")
export const adminId = OwnerId.make("770e8400-e29b-41d4-a716-446655440004")

export const customerX = new Requester({ userId: ownerX, role: "CUSTOMER" })
export const customerY = new Requester({ userId: ownerY, role: "CUSTOMER" })
export const admin = new Requester({ userId: adminId, role: "ADMIN" })

export const makeHolder = (
  overrides: {
    readonly id?: HolderId
    readonly kind?: HolderKind
    readonly name?: string
    readonly totalCapacity?: number
    readonly availableCapacity?: number
    readonly priceCents?: number | null
  } = {}
) =>
  new CapacityHolder({
    id: overrides.id ?? holderIdA,
    kind: overrides.kind ?? "PRODUCT",
    name: overrides.name ?? "Test Widget",
    totalCapacity: overrides.totalCapacity ?? 10,
    availableCapacity: overrides.availableCapacity ?? overrides.totalCapacity ?? 10,
    priceCents: overrides.priceCents === undefined ? 2999 : overrides.priceCents,
    createdAt: DateTime.unsafeNow(),
    updatedAt: DateTime.unsafeNow()
  })

/** Left side of an Either; throws when it is a Right. */
export const leftOf = <R, L>(result: Either.Either<R, L>): L =>
  Either.getOrThrowWith(Either.flip(result), () => new Error("expected a Left"))
