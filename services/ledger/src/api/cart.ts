import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Effect, Option } from "effect"
import { AddCartItemRequest, CartItemIdParams, UpdateCartItemRequest } from "../domain/Cart.js"
import { CartService } from "../services/CartService.js"
import { requireIdentity } from "./identity.js"
import { toCartItemResponse, toCartResponse } from "./responses.js"
import {
  cartItemNotFound,
  forbidden,
  holderKindMismatch,
  holderNotFound,
  insufficientCapacity,
  internalError,
  missingIdentity,
  requestError,
  validationError
} from "./errors.js"

// GET /cart - Cart lines priced at current holder prices
const getCart = Effect.gen(function* () {
  const requester = yield* requireIdentity

  const service = yield* CartService
  const cart = yield* service.getCart(requester.userId)

  return yield* HttpServerResponse.json(toCartResponse(cart))
}).pipe(
  Effect.withSpan("GET /cart"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    SqlError: internalError("getCart")
  })
)

// POST /cart/items - Add a product, merging with an existing line
const addItem = Effect.gen(function* () {
  const requester = yield* requireIdentity
  const body = yield* HttpServerRequest.schemaBodyJson(AddCartItemRequest)

  const service = yield* CartService
  const item = yield* service.addItem(requester.userId, body.holderId, body.quantity)

  return yield* HttpServerResponse.json(toCartItemResponse(item), { status: 201 })
}).pipe(
  Effect.withSpan("POST /cart/items"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ParseError: validationError,
    RequestError: requestError,
    HolderNotFoundError: holderNotFound,
    HolderKindMismatchError: holderKindMismatch,
    InsufficientCapacityError: insufficientCapacity,
    CartItemNotFoundError: cartItemNotFound,
    SqlError: internalError("addCartItem")
  })
)

// PATCH /cart/items/:item_id - Set quantity; 0 removes the line
const updateItem = Effect.gen(function* () {
  const requester = yield* requireIdentity
  const { item_id: itemId } = yield* HttpRouter.schemaPathParams(CartItemIdParams)
  const body = yield* HttpServerRequest.schemaBodyJson(UpdateCartItemRequest)

  const service = yield* CartService
  const updated = yield* service.updateItem(requester.userId, itemId, body.quantity)

  return yield* Option.match(updated, {
    onNone: () => Effect.succeed(HttpServerResponse.empty({ status: 204 })),
    onSome: (item) => HttpServerResponse.json(toCartItemResponse(item))
  })
}).pipe(
  Effect.withSpan("PATCH /cart/items/:item_id"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ParseError: validationError,
    RequestError: requestError,
    CartItemNotFoundError: cartItemNotFound,
    ForbiddenError: forbidden,
    HolderNotFoundError: holderNotFound,
    InsufficientCapacityError: insufficientCapacity,
    SqlError: internalError("updateCartItem")
  })
)

// DELETE /cart/items/:item_id
const removeItem = Effect.gen(function* () {
  const requester = yield* requireIdentity
  const { item_id: itemId } = yield* HttpRouter.schemaPathParams(CartItemIdParams)

  const service = yield* CartService
  yield* service.removeItem(requester.userId, itemId)

  return HttpServerResponse.empty({ status: 204 })
}).pipe(
  Effect.withSpan("DELETE /cart/items/:item_id"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    ParseError: validationError,
    CartItemNotFoundError: cartItemNotFound,
    ForbiddenError: forbidden,
    SqlError: internalError("removeCartItem")
  })
)

// DELETE /cart - Empty the cart
const clearCart = Effect.gen(function* () {
  const requester = yield* requireIdentity

  const service = yield* CartService
  const removed = yield* service.clear(requester.userId)

  return yield* HttpServerResponse.json({ removed_count: removed })
}).pipe(
  Effect.withSpan("DELETE /cart"),
  Effect.catchTags({
    MissingIdentityError: missingIdentity,
    SqlError: internalError("clearCart")
  })
)

export const CartRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/cart", getCart),
  HttpRouter.post("/cart/items", addItem),
  HttpRouter.patch("/cart/items/:item_id", updateItem),
  HttpRouter.del("/cart/items/:item_id", removeItem),
  HttpRouter.del("/cart", clearCart)
)
