import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Effect, Option } from "effect"
import {
  AggregateIdParams,
  HumanIdParams,
  ListAggregatesQuery,
  UpdateStatusRequest
} from "../domain/Aggregate.js"
import { AggregateService } from "../services/AggregateService.js"
import { LedgerConfig } from "../config.js"
import { requireAdmin, requireIdentity } from "./identity.js"
import { toAggregateResponse, toAggregateSummary } from "./responses.js"
import {
  aggregateNotFound,
  capacityOverflow,
  forbidden,
  holderNotFound,
  internalError,
  invalidQuantity,
  invalidStatusTransition,
  missingIdentity,
  requestError,
  validationError
} from "./errors.js"

// GET /aggregates?page=&size=&kind= - The caller's orders and bookings, newest first
const listAggregates = Effect.gen(function* () {
  const requester = yield* requireIdentity
  const query = yield* HttpServerRequest.schemaSearchParams(ListAggregatesQuery)
  const config = yield* LedgerConfig

  const page = query.page ?? 0
  const size = Math.min(query.size ?? config.defaultPageSize, config.maxPageSize)

  const service = yield* AggregateService
  const aggregates = yield* service.listForOwner(requester.userId, {
    page,
    size,
    kind: Option.fromNullable(query.kind)
  })

  return yield* HttpServerResponse.json({
    aggregates: aggregates.map(toAggregateSummary),
    page,
    size
  })
}).pipe(
  Effect.withSpan("GET /aggregates"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ParseError: validationError,
    SqlError: internalError("listAggregates")
  })
)

// GET /aggregates/:aggregate_id - Owner or admin only
const getAggregateById = Effect.gen(function* () {
  const requester = yield* requireIdentity
  const { aggregate_id: aggregateId } = yield* HttpRouter.schemaPathParams(AggregateIdParams)

  const service = yield* AggregateService
  const result = yield* service.getAggregateById(aggregateId, requester)

  return yield* HttpServerResponse.json(toAggregateResponse(result))
}).pipe(
  Effect.withSpan("GET /aggregates/:aggregate_id"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ParseError: validationError,
    AggregateNotFoundError: aggregateNotFound,
    ForbiddenError: forbidden,
    SqlError: internalError("getAggregateById")
  })
)

// GET /aggregates/by-human-id/:human_id
const getAggregateByHumanId = Effect.gen(function* () {
  const requester = yield* requireIdentity
  const { human_id: humanId } = yield* HttpRouter.schemaPathParams(HumanIdParams)

  const service = yield* AggregateService
  const result = yield* service.getAggregateByHumanId(humanId, requester)

  return yield* HttpServerResponse.json(toAggregateResponse(result))
}).pipe(
  Effect.withSpan("GET /aggregates/by-human-id/:human_id"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ParseError: validationError,
    AggregateNotFoundError: aggregateNotFound,
    ForbiddenError: forbidden,
    SqlError: internalError("getAggregateByHumanId")
  })
)

// PATCH /aggregates/:aggregate_id/status - Admin status change
const updateStatus = Effect.gen(function* () {
  yield* requireAdmin
  const { aggregate_id: aggregateId } = yield* HttpRouter.schemaPathParams(AggregateIdParams)
  const body = yield* HttpServerRequest.schemaBodyJson(UpdateStatusRequest)

  const service = yield* AggregateService
  const result = yield* service.updateStatus(aggregateId, body.status)

  return yield* HttpServerResponse.json(toAggregateResponse(result))
}).pipe(
  Effect.withSpan("PATCH /aggregates/:aggregate_id/status"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ForbiddenError: forbidden,
    ParseError: validationError,
    RequestError: requestError,
    AggregateNotFoundError: aggregateNotFound,
    InvalidStatusTransitionError: invalidStatusTransition,
    SqlError: internalError("updateStatus")
  })
)

// POST /aggregates/:aggregate_id/cancellation - Cancel and release capacity
const cancelAggregate = Effect.gen(function* () {
  const requester = yield* requireIdentity
  const { aggregate_id: aggregateId } = yield* HttpRouter.schemaPathParams(AggregateIdParams)

  const service = yield* AggregateService
  const result = yield* service.cancel(aggregateId, requester)

  return yield* HttpServerResponse.json(toAggregateResponse(result))
}).pipe(
  Effect.withSpan("POST /aggregates/:aggregate_id/cancellation"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ParseError: validationError,
    AggregateNotFoundError: aggregateNotFound,
    ForbiddenError: forbidden,
    InvalidStatusTransitionError: invalidStatusTransition,
    HolderNotFoundError: holderNotFound,
    CapacityOverflowError: capacityOverflow,
    InvalidQuantityError: invalidQuantity,
    SqlError: internalError("cancelAggregate")
  })
)

export const AggregateRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/aggregates", listAggregates),
  HttpRouter.get("/aggregates/by-human-id/:human_id", getAggregateByHumanId),
  HttpRouter.get("/aggregates/:aggregate_id", getAggregateById),
  HttpRouter.patch("/aggregates/:aggregate_id/status", updateStatus),
  HttpRouter.post("/aggregates/:aggregate_id/cancellation", cancelAggregate)
)
