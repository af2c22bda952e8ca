import { Schema } from "effect"
import { MAX_INT4, Uuid, int4Message } from "./Primitives.js"

export const HolderId = Uuid.pipe(Schema.brand("HolderId"))
export type HolderId = typeof HolderId.Type

// PRODUCT holders carry stock and are ordered; EVENT holders carry seats and are booked
export const HolderKind = Schema.Literal("PRODUCT", "EVENT")
export type HolderKind = typeof HolderKind.Type

export const HolderIdParams = Schema.Struct({
  holder_id: HolderId
})

export class CapacityHolder extends Schema.Class<CapacityHolder>("CapacityHolder")({
  id: HolderId,
  kind: HolderKind,
  name: Schema.String,
  totalCapacity: Schema.Int.pipe(Schema.nonNegative()),
  availableCapacity: Schema.Int.pipe(Schema.nonNegative()),
  priceCents: Schema.NullOr(Schema.Int.pipe(Schema.nonNegative())),
  createdAt: Schema.DateTimeUtc,
  updatedAt: Schema.DateTimeUtc
}) {
  /** Quantity currently committed to non-cancelled reservations. */
  get bookedAmount(): number {
    return this.totalCapacity - this.availableCapacity
  }
}

export class CreateHolderRequest extends Schema.Class<CreateHolderRequest>("CreateHolderRequest")({
  kind: HolderKind,
  name: Schema.String.pipe(
    Schema.minLength(1, { message: () => "Name cannot be empty" }),
    Schema.maxLength(255, { message: () => "Name cannot exceed 255 characters" })
  ),
  totalCapacity: Schema.Int.pipe(
    Schema.nonNegative({ message: () => "Total capacity cannot be negative" }),
    Schema.lessThanOrEqualTo(MAX_INT4, { message: int4Message })
  ),
  priceCents: Schema.optionalWith(
    Schema.NullOr(
      Schema.Int.pipe(
        Schema.nonNegative({ message: () => "Price cannot be negative" }),
        Schema.lessThanOrEqualTo(MAX_INT4, { message: int4Message })
      )
    ),
    { default: () => null }
  )
}) {}

export class AdjustCapacityRequest extends Schema.Class<AdjustCapacityRequest>("AdjustCapacityRequest")({
  totalCapacity: Schema.Int.pipe(
    Schema.nonNegative({ message: () => "Total capacity cannot be negative" }),
    Schema.lessThanOrEqualTo(MAX_INT4, { message: int4Message })
  )
}) {}

export class UpdatePriceRequest extends Schema.Class<UpdatePriceRequest>("UpdatePriceRequest")({
  priceCents: Schema.NullOr(
    Schema.Int.pipe(
      Schema.nonNegative({ message: () => "Price cannot be negative" }),
      Schema.lessThanOrEqualTo(MAX_INT4, { message: int4Message })
    )
  )
}) {}

export const ListHoldersQuery = Schema.Struct({
  kind: Schema.optional(HolderKind)
})
