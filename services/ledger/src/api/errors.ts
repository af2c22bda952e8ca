import { HttpServerResponse } from "@effect/platform"
import type { HttpServerError } from "@effect/platform"
import { SqlError } from "@effect/sql"
import { Effect, ParseResult } from "effect"
import type {
  AggregateNotFoundError,
  AmountTooLargeError,
  CapacityOverflowError,
  CartItemNotFoundError,
  EmptyInputError,
  ForbiddenError,
  HolderKindMismatchError,
  HolderNotFoundError,
  InsufficientCapacityError,
  InvalidCapacityError,
  InvalidQuantityError,
  InvalidStatusTransitionError,
  MissingIdentityError
} from "../domain/errors.js"

// Error responses shared by the route modules, one per tagged error

export const validationError = (error: ParseResult.ParseError) =>
  HttpServerResponse.json(
    {
      error: "validation_error",
      message: "Invalid request data",
      details: error.message
    },
    { status: 400 }
  )

export const requestError = (_error: HttpServerError.RequestError) =>
  HttpServerResponse.json(
    { error: "request_error", message: "Failed to parse request body" },
    { status: 400 }
  )

export const missingIdentity = (_error: MissingIdentityError) =>
  HttpServerResponse.json(
    { error: "unauthorized", message: "A valid x-user-id header is required" },
    { status: 401 }
  )

// Says nothing about the resource beyond the fact that access was refused
export const forbidden = (_error: ForbiddenError) =>
  HttpServerResponse.json(
    { error: "forbidden", message: "You do not have access to this resource" },
    { status: 403 }
  )

export const holderNotFound = (error: HolderNotFoundError) =>
  HttpServerResponse.json(
    {
      error: "holder_not_found",
      message: `Capacity holder with ID ${error.holderId} does not exist`
    },
    { status: 404 }
  )

export const aggregateNotFound = (error: AggregateNotFoundError) =>
  HttpServerResponse.json(
    {
      error: "not_found",
      message: error.searchedBy === "humanId"
        ? `Aggregate ${error.aggregateId} not found`
        : `Aggregate with ID ${error.aggregateId} not found`
    },
    { status: 404 }
  )

export const cartItemNotFound = (error: CartItemNotFoundError) =>
  HttpServerResponse.json(
    { error: "not_found", message: `Cart item with ID ${error.cartItemId} not found` },
    { status: 404 }
  )

// 409 because the request conflicts with current resource state
export const insufficientCapacity = (error: InsufficientCapacityError) =>
  HttpServerResponse.json(
    {
      error: "insufficient_capacity",
      message: `Insufficient capacity for ${error.holderName}`,
      holder_id: error.holderId,
      requested: error.requested,
      available: error.available
    },
    { status: 409 }
  )

export const capacityOverflow = (error: CapacityOverflowError) =>
  HttpServerResponse.json(
    {
      error: "capacity_overflow",
      message: `Releasing ${error.delta} would exceed the total capacity of ${error.holderId}`,
      holder_id: error.holderId,
      available: error.available,
      total: error.total
    },
    { status: 409 }
  )

export const invalidCapacity = (error: InvalidCapacityError) =>
  HttpServerResponse.json(
    {
      error: "invalid_capacity",
      message: `Total capacity ${error.requestedTotal} is below the booked amount ${error.bookedAmount}`,
      holder_id: error.holderId,
      requested_total: error.requestedTotal,
      booked_amount: error.bookedAmount
    },
    { status: 409 }
  )

export const invalidStatusTransition = (error: InvalidStatusTransitionError) =>
  HttpServerResponse.json(
    {
      error: "invalid_status_transition",
      message: `Cannot move aggregate from ${error.currentStatus} to ${error.attemptedStatus}`,
      current_status: error.currentStatus,
      attempted_status: error.attemptedStatus
    },
    { status: 409 }
  )

export const emptyInput = (error: EmptyInputError) =>
  HttpServerResponse.json(
    {
      error: "empty_input",
      message: error.source === "cart" ? "Cart is empty" : "At least one line item is required"
    },
    { status: 400 }
  )

export const holderKindMismatch = (error: HolderKindMismatchError) =>
  HttpServerResponse.json(
    {
      error: "holder_kind_mismatch",
      message: `Holder ${error.holderId} is a ${error.actualKind}, expected ${error.expectedKind}`,
      holder_id: error.holderId,
      expected_kind: error.expectedKind,
      actual_kind: error.actualKind
    },
    { status: 400 }
  )

export const invalidQuantity = (error: InvalidQuantityError) =>
  HttpServerResponse.json(
    {
      error: "invalid_quantity",
      message: `Quantity must be a positive integer, got ${error.quantity}`,
      holder_id: error.holderId
    },
    { status: 400 }
  )

export const amountTooLarge = (error: AmountTooLargeError) =>
  HttpServerResponse.json(
    {
      error: "amount_too_large",
      message: `Total amount ${error.totalAmountCents} is too large to record`
    },
    { status: 400 }
  )

export const internalError = (operation: string) => (error: SqlError.SqlError) =>
  Effect.gen(function* () {
    yield* Effect.logError(`Database error in ${operation}`, { error })
    return HttpServerResponse.json(
      { error: "internal_error", message: "An unexpected error occurred" },
      { status: 500 }
    )
  }).pipe(Effect.flatten)
