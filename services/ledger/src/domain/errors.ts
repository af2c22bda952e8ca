import { Data } from "effect"

/**
 * Capacity holder was not found in the database.
 */
export class HolderNotFoundError extends Data.TaggedError("HolderNotFoundError")<{
  readonly holderId: string
}> {}

/**
 * Aggregate (order or booking) was not found.
 * Context includes how the search was performed to aid debugging.
 */
export class AggregateNotFoundError extends Data.TaggedError("AggregateNotFoundError")<{
  readonly aggregateId: string
  readonly searchedBy: "id" | "humanId"
}> {}

export class CartItemNotFoundError extends Data.TaggedError("CartItemNotFoundError")<{
  readonly cartItemId: string
}> {}

/**
 * Requested quantity exceeds what the holder has left.
 * Includes both requested and available quantities for user messaging.
 */
export class InsufficientCapacityError extends Data.TaggedError("InsufficientCapacityError")<{
  readonly holderId: string
  readonly holderName: string
  readonly requested: number
  readonly available: number
}> {}

/**
 * Releasing capacity would push the available counter above the holder's total.
 */
export class CapacityOverflowError extends Data.TaggedError("CapacityOverflowError")<{
  readonly holderId: string
  readonly delta: number
  readonly available: number
  readonly total: number
}> {}

/**
 * The ledger was asked to move a quantity that is not a positive integer.
 */
export class InvalidQuantityError extends Data.TaggedError("InvalidQuantityError")<{
  readonly holderId: string
  readonly quantity: number
}> {}

/**
 * A commit's total amount is larger than can be stored exactly.
 */
export class AmountTooLargeError extends Data.TaggedError("AmountTooLargeError")<{
  readonly totalAmountCents: number
}> {}

/**
 * A commit was attempted with no line items, either from an empty request
 * body or an empty cart.
 */
export class EmptyInputError extends Data.TaggedError("EmptyInputError")<{
  readonly source: "request" | "cart"
}> {}

/**
 * A line item points at a holder of the wrong kind, e.g. booking seats on a product.
 */
export class HolderKindMismatchError extends Data.TaggedError("HolderKindMismatchError")<{
  readonly holderId: string
  readonly expectedKind: string
  readonly actualKind: string
}> {}

/**
 * Requester may not act on the resource. Carries no details of the resource
 * beyond its id.
 */
export class ForbiddenError extends Data.TaggedError("ForbiddenError")<{
  readonly requesterId: string
  readonly resource: string
}> {}

/**
 * Capacity adjustment would drop the total below what is already booked.
 */
export class InvalidCapacityError extends Data.TaggedError("InvalidCapacityError")<{
  readonly holderId: string
  readonly requestedTotal: number
  readonly bookedAmount: number
}> {}

/**
 * Status change not allowed from the aggregate's current status.
 */
export class InvalidStatusTransitionError extends Data.TaggedError("InvalidStatusTransitionError")<{
  readonly aggregateId: string
  readonly currentStatus: string
  readonly attemptedStatus: string
}> {}

/**
 * Request carried no usable identity headers.
 */
export class MissingIdentityError extends Data.TaggedError("MissingIdentityError")<{}> {}
