import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Effect, Option } from "effect"
import {
  AdjustCapacityRequest,
  CreateHolderRequest,
  HolderIdParams,
  ListHoldersQuery,
  UpdatePriceRequest
} from "../domain/CapacityHolder.js"
import { HolderService } from "../services/HolderService.js"
import { LedgerService } from "../services/LedgerService.js"
import { requireAdmin } from "./identity.js"
import { toHolderResponse } from "./responses.js"
import {
  forbidden,
  holderNotFound,
  internalError,
  invalidCapacity,
  missingIdentity,
  requestError,
  validationError
} from "./errors.js"

// POST /holders - Register a product or event with its capacity
const createHolder = Effect.gen(function* () {
  yield* requireAdmin
  const body = yield* HttpServerRequest.schemaBodyJson(CreateHolderRequest)

  const service = yield* HolderService
  const holder = yield* service.create(body)

  return yield* HttpServerResponse.json(toHolderResponse(holder), { status: 201 })
}).pipe(
  Effect.withSpan("POST /holders"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ForbiddenError: forbidden,
    ParseError: validationError,
    RequestError: requestError,
    SqlError: internalError("createHolder")
  })
)

// GET /holders?kind= - List holders, optionally of one kind
const listHolders = Effect.gen(function* () {
  const query = yield* HttpServerRequest.schemaSearchParams(ListHoldersQuery)

  const service = yield* HolderService
  const holders = yield* service.list(Option.fromNullable(query.kind))

  return yield* HttpServerResponse.json({ holders: holders.map(toHolderResponse) })
}).pipe(
  Effect.withSpan("GET /holders"),
  Effect.catchTags({
    ParseError: validationError,
    SqlError: internalError("listHolders")
  })
)

// GET /holders/:holder_id - Current counters of one holder
const getHolder = Effect.gen(function* () {
  const { holder_id: holderId } = yield* HttpRouter.schemaPathParams(HolderIdParams)

  const service = yield* HolderService
  const holder = yield* service.findById(holderId)

  return yield* HttpServerResponse.json(toHolderResponse(holder))
}).pipe(
  Effect.withSpan("GET /holders/:holder_id"),
  Effect.catchTags({
    ParseError: validationError,
    HolderNotFoundError: holderNotFound,
    SqlError: internalError("getHolder")
  })
)

// PUT /holders/:holder_id/capacity - Resize total capacity, keeping bookings
const adjustCapacity = Effect.gen(function* () {
  yield* requireAdmin
  const { holder_id: holderId } = yield* HttpRouter.schemaPathParams(HolderIdParams)
  const body = yield* HttpServerRequest.schemaBodyJson(AdjustCapacityRequest)

  const ledger = yield* LedgerService
  const holder = yield* ledger.adjustTotalCapacity(holderId, body.totalCapacity)

  return yield* HttpServerResponse.json(toHolderResponse(holder))
}).pipe(
  Effect.withSpan("PUT /holders/:holder_id/capacity"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ForbiddenError: forbidden,
    ParseError: validationError,
    RequestError: requestError,
    HolderNotFoundError: holderNotFound,
    InvalidCapacityError: invalidCapacity,
    SqlError: internalError("adjustCapacity")
  })
)

// PUT /holders/:holder_id/price - Change the price for future reservations
const updatePrice = Effect.gen(function* () {
  yield* requireAdmin
  const { holder_id: holderId } = yield* HttpRouter.schemaPathParams(HolderIdParams)
  const body = yield* HttpServerRequest.schemaBodyJson(UpdatePriceRequest)

  const service = yield* HolderService
  const holder = yield* service.updatePrice(holderId, body.priceCents)

  return yield* HttpServerResponse.json(toHolderResponse(holder))
}).pipe(
  Effect.withSpan("PUT /holders/:holder_id/price"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ForbiddenError: forbidden,
    ParseError: validationError,
    RequestError: requestError,
    HolderNotFoundError: holderNotFound,
    SqlError: internalError("updatePrice")
  })
)

export const HolderRoutes = HttpRouter.empty.pipe(
  HttpRouter.post("/holders", createHolder),
  HttpRouter.get("/holders", listHolders),
  HttpRouter.get("/holders/:holder_id", getHolder),
  HttpRouter.put("/holders/:holder_id/capacity", adjustCapacity),
  HttpRouter.put("/holders/:holder_id/price", updatePrice)
)
