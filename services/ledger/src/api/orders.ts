import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"
import { CreateBookingRequest, CreateOrderRequest } from "../domain/Aggregate.js"
import { AggregateService } from "../services/AggregateService.js"
import { requireIdentity } from "./identity.js"
import { toAggregateResponse } from "./responses.js"
import {
  amountTooLarge,
  emptyInput,
  holderKindMismatch,
  holderNotFound,
  insufficientCapacity,
  internalError,
  invalidQuantity,
  missingIdentity,
  requestError,
  validationError
} from "./errors.js"

// POST /orders - Commit an order from explicit line items
const createOrder = Effect.gen(function* () {
  const requester = yield* requireIdentity
  const body = yield* HttpServerRequest.schemaBodyJson(CreateOrderRequest)

  const service = yield* AggregateService
  const result = yield* service.createAggregate(requester.userId, "ORDER", body.items)

  return yield* HttpServerResponse.json(toAggregateResponse(result), { status: 201 })
}).pipe(
  Effect.withSpan("POST /orders"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ParseError: validationError,
    RequestError: requestError,
    EmptyInputError: emptyInput,
    HolderNotFoundError: holderNotFound,
    HolderKindMismatchError: holderKindMismatch,
    InsufficientCapacityError: insufficientCapacity,
    InvalidQuantityError: invalidQuantity,
    AmountTooLargeError: amountTooLarge,
    SqlError: internalError("createOrder")
  })
)

// POST /orders/checkout - Commit the caller's cart as an order
const checkout = Effect.gen(function* () {
  const requester = yield* requireIdentity

  const service = yield* AggregateService
  const result = yield* service.checkoutCart(requester.userId)

  return yield* HttpServerResponse.json(toAggregateResponse(result), { status: 201 })
}).pipe(
  Effect.withSpan("POST /orders/checkout"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    EmptyInputError: emptyInput,
    HolderNotFoundError: holderNotFound,
    HolderKindMismatchError: holderKindMismatch,
    InsufficientCapacityError: insufficientCapacity,
    InvalidQuantityError: invalidQuantity,
    AmountTooLargeError: amountTooLarge,
    SqlError: internalError("checkout")
  })
)

// POST /bookings - Book seats on one or more events
const createBooking = Effect.gen(function* () {
  const requester = yield* requireIdentity
  const body = yield* HttpServerRequest.schemaBodyJson(CreateBookingRequest)

  const service = yield* AggregateService
  const result = yield* service.createAggregate(
    requester.userId,
    "BOOKING",
    body.items.map((line) => ({ holderId: line.holderId, quantity: line.seats }))
  )

  return yield* HttpServerResponse.json(toAggregateResponse(result), { status: 201 })
}).pipe(
  Effect.withSpan("POST /bookings"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ParseError: validationError,
    RequestError: requestError,
    EmptyInputError: emptyInput,
    HolderNotFoundError: holderNotFound,
    HolderKindMismatchError: holderKindMismatch,
    InsufficientCapacityError: insufficientCapacity,
    InvalidQuantityError: invalidQuantity,
    AmountTooLargeError: amountTooLarge,
    SqlError: internalError("createBooking")
  })
)

export const OrderRoutes = HttpRouter.empty.pipe(
  HttpRouter.post("/orders/checkout", checkout),
  HttpRouter.post("/orders", createOrder),
  HttpRouter.post("/bookings", createBooking)
)
