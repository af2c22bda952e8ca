import { Schema } from "effect"
import { MAX_INT4, Uuid, int4Message } from "./Primitives.js"
import { LineItemRequest, type Reservation } from "./Reservation.js"

export const AggregateId = Uuid.pipe(Schema.brand("AggregateId"))
export type AggregateId = typeof AggregateId.Type

export const OwnerId = Uuid.pipe(Schema.brand("OwnerId"))
export type OwnerId = typeof OwnerId.Type

export const AggregateKind = Schema.Literal("ORDER", "BOOKING")
export type AggregateKind = typeof AggregateKind.Type

export const AggregateStatus = Schema.Literal(
  "CREATED",
  "CONFIRMED",
  "PREPARING",
  "READY",
  "DELIVERED",
  "CANCELLED"
)
export type AggregateStatus = typeof AggregateStatus.Type

export class Aggregate extends Schema.Class<Aggregate>("Aggregate")({
  id: AggregateId,
  humanId: Schema.String,
  kind: AggregateKind,
  ownerId: OwnerId,
  status: AggregateStatus,
  totalAmountCents: Schema.Int.pipe(Schema.nonNegative()),
  createdAt: Schema.DateTimeUtc,
  updatedAt: Schema.DateTimeUtc
}) {}

export interface AggregateWithItems {
  readonly aggregate: Aggregate
  readonly items: ReadonlyArray<Reservation>
}

// Items may be empty here; an empty commit is rejected by the aggregator itself
export class CreateOrderRequest extends Schema.Class<CreateOrderRequest>("CreateOrderRequest")({
  items: Schema.Array(LineItemRequest)
}) {}

export class BookingLineRequest extends Schema.Class<BookingLineRequest>("BookingLineRequest")({
  holderId: LineItemRequest.fields.holderId,
  seats: Schema.Int.pipe(
    Schema.positive({ message: () => "Seats must be positive" }),
    Schema.lessThanOrEqualTo(MAX_INT4, { message: int4Message })
  )
}) {}

// One or more seat lines, possibly on different events
export class CreateBookingRequest extends Schema.Class<CreateBookingRequest>("CreateBookingRequest")({
  items: Schema.Array(BookingLineRequest)
}) {}

export class UpdateStatusRequest extends Schema.Class<UpdateStatusRequest>("UpdateStatusRequest")({
  status: AggregateStatus
}) {}

export const AggregateIdParams = Schema.Struct({
  aggregate_id: AggregateId
})

export const HumanIdParams = Schema.Struct({
  human_id: Schema.String.pipe(Schema.minLength(1), Schema.maxLength(64))
})

export const ListAggregatesQuery = Schema.Struct({
  page: Schema.optional(Schema.NumberFromString.pipe(Schema.int(), Schema.nonNegative())),
  size: Schema.optional(Schema.NumberFromString.pipe(Schema.int(), Schema.positive())),
  kind: Schema.optional(AggregateKind)
})
