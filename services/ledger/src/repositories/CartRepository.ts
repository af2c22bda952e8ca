import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type { OwnerId } from "../domain/Aggregate.js"
import type { HolderId } from "../domain/CapacityHolder.js"
import type { CartItem, CartItemId } from "../domain/Cart.js"

export interface CreateCartItemRow {
  readonly ownerId: OwnerId
  readonly holderId: HolderId
  readonly quantity: number
}

export class CartRepository extends Context.Tag("CartRepository")<
  CartRepository,
  {
    /**
     * Items of one owner in insertion order.
     */
    readonly listByOwner: (ownerId: OwnerId) => Effect.Effect<ReadonlyArray<CartItem>, SqlError.SqlError>
    readonly findById: (id: CartItemId) => Effect.Effect<Option.Option<CartItem>, SqlError.SqlError>
    readonly findByOwnerAndHolder: (
      ownerId: OwnerId,
      holderId: HolderId
    ) => Effect.Effect<Option.Option<CartItem>, SqlError.SqlError>
    readonly insert: (row: CreateCartItemRow) => Effect.Effect<CartItem, SqlError.SqlError>
    readonly updateQuantity: (
      id: CartItemId,
      quantity: number
    ) => Effect.Effect<Option.Option<CartItem>, SqlError.SqlError>
    readonly delete: (id: CartItemId) => Effect.Effect<void, SqlError.SqlError>

    /**
     * Returns the number of rows removed.
     */
    readonly clearByOwner: (ownerId: OwnerId) => Effect.Effect<number, SqlError.SqlError>
  }
>() {}
