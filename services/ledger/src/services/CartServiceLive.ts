import { Layer, Effect, Option } from "effect"
import { CartService } from "./CartService.js"
import { fromOption } from "./HolderServiceLive.js"
import { CartRepository } from "../repositories/CartRepository.js"
import { HolderRepository } from "../repositories/HolderRepository.js"
import { UnitOfWork } from "../repositories/UnitOfWork.js"
import type { OwnerId } from "../domain/Aggregate.js"
import type { HolderId } from "../domain/CapacityHolder.js"
import type { CartItemId, CartLine } from "../domain/Cart.js"
import { checkHolderKind, snapshotPrice, validateReservation } from "../domain/Ledger.js"
import {
  CartItemNotFoundError,
  ForbiddenError,
  HolderNotFoundError
} from "../domain/errors.js"

export const CartServiceLive = Layer.effect(
  CartService,
  Effect.gen(function* () {
    const carts = yield* CartRepository
    const holders = yield* HolderRepository
    const uow = yield* UnitOfWork

    const findHolder = (holderId: HolderId) =>
      holders.findById(holderId).pipe(
        Effect.flatMap(fromOption(() => new HolderNotFoundError({ holderId })))
      )

    const findOwnedItem = (ownerId: OwnerId, itemId: CartItemId) =>
      carts.findById(itemId).pipe(
        Effect.flatMap(fromOption(() => new CartItemNotFoundError({ cartItemId: itemId }))),
        Effect.flatMap((item) =>
          item.ownerId === ownerId
            ? Effect.succeed(item)
            : Effect.fail(new ForbiddenError({ requesterId: ownerId, resource: `cart_item:${itemId}` }))
        )
      )

    return {
      getCart: (ownerId: OwnerId) =>
        Effect.gen(function* () {
          const items = yield* carts.listByOwner(ownerId)
          const byId = new Map(
            (yield* holders.findByIds([...new Set(items.map((item) => item.holderId))])).map(
              (holder) => [holder.id, holder]
            )
          )

          const lines: CartLine[] = []
          for (const item of items) {
            const holder = byId.get(item.holderId)
            // Holder rows cascade to cart rows, so a miss means a concurrent delete
            if (holder === undefined) continue
            const unitPriceCents = snapshotPrice(holder)
            lines.push({
              item,
              holderName: holder.name,
              unitPriceCents,
              subtotalCents: unitPriceCents * item.quantity
            })
          }

          return {
            lines,
            totalCents: lines.reduce((sum, line) => sum + line.subtotalCents, 0)
          }
        }),

      addItem: (ownerId: OwnerId, holderId: HolderId, quantity: number) =>
        uow.withTransaction(
          Effect.gen(function* () {
            const holder = yield* findHolder(holderId)
            yield* checkHolderKind(holder, "ORDER")

            const existing = yield* carts.findByOwnerAndHolder(ownerId, holderId)
            const merged = Option.match(existing, {
              onNone: () => quantity,
              onSome: (item) => item.quantity + quantity
            })
            yield* validateReservation(holder, merged)

            if (Option.isSome(existing)) {
              return yield* carts.updateQuantity(existing.value.id, merged).pipe(
                Effect.flatMap(
                  fromOption(() => new CartItemNotFoundError({ cartItemId: existing.value.id }))
                )
              )
            }
            return yield* carts.insert({ ownerId, holderId, quantity })
          })
        ).pipe(
          Effect.tap((item) =>
            Effect.logInfo("Cart item added", { ownerId, holderId, quantity: item.quantity })
          ),
          Effect.withSpan("CartService.addItem")
        ),

      updateItem: (ownerId: OwnerId, itemId: CartItemId, quantity: number) =>
        uow.withTransaction(
          Effect.gen(function* () {
            const item = yield* findOwnedItem(ownerId, itemId)

            if (quantity === 0) {
              yield* carts.delete(item.id)
              return Option.none()
            }

            const holder = yield* findHolder(item.holderId)
            yield* validateReservation(holder, quantity)
            return yield* carts.updateQuantity(item.id, quantity)
          })
        ).pipe(Effect.withSpan("CartService.updateItem")),

      removeItem: (ownerId: OwnerId, itemId: CartItemId) =>
        findOwnedItem(ownerId, itemId).pipe(
          Effect.flatMap((item) => carts.delete(item.id)),
          Effect.withSpan("CartService.removeItem")
        ),

      clear: (ownerId: OwnerId) =>
        carts.clearByOwner(ownerId).pipe(
          Effect.tap((removed) => Effect.logInfo("Cart cleared", { ownerId, removed }))
        )
    }
  })
)
