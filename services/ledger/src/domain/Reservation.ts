import { Schema } from "effect"
import { MAX_INT4, Uuid, int4Message } from "./Primitives.js"
import { HolderId } from "./CapacityHolder.js"

export const ReservationId = Uuid.pipe(Schema.brand("ReservationId"))
export type ReservationId = typeof ReservationId.Type

// A committed line of an aggregate. Never updated after insert.
export class Reservation extends Schema.Class<Reservation>("Reservation")({
  id: ReservationId,
  aggregateId: Uuid,
  holderId: HolderId,
  quantity: Schema.Int.pipe(Schema.positive()),
  unitPriceCents: Schema.Int.pipe(Schema.nonNegative()),
  createdAt: Schema.DateTimeUtc
}) {}

export class LineItemRequest extends Schema.Class<LineItemRequest>("LineItemRequest")({
  holderId: HolderId,
  quantity: Schema.Int.pipe(
    Schema.positive({ message: () => "Quantity must be positive" }),
    Schema.lessThanOrEqualTo(MAX_INT4, { message: int4Message })
  )
}) {}

/**
 * Outcome of reserving one line inside a commit: the quantity taken, the
 * price snapshot, and the counter left behind on the holder.
 */
export interface ReservedLine {
  readonly holderId: HolderId
  readonly holderName: string
  readonly quantity: number
  readonly unitPriceCents: number
  readonly availableAfter: number
}
