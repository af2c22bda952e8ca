import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type { OwnerId } from "../domain/Aggregate.js"
import type { HolderId } from "../domain/CapacityHolder.js"
import type { CartItem, CartItemId, CartView } from "../domain/Cart.js"
import type {
  CartItemNotFoundError,
  ForbiddenError,
  HolderKindMismatchError,
  HolderNotFoundError,
  InsufficientCapacityError
} from "../domain/errors.js"

export class CartService extends Context.Tag("CartService")<
  CartService,
  {
    readonly getCart: (ownerId: OwnerId) => Effect.Effect<CartView, SqlError.SqlError>

    /**
     * Adds to the cart, merging with an existing line for the same holder.
     * Checks the merged quantity against current availability but reserves nothing.
     */
    readonly addItem: (
      ownerId: OwnerId,
      holderId: HolderId,
      quantity: number
    ) => Effect.Effect<
      CartItem,
      | HolderNotFoundError
      | HolderKindMismatchError
      | InsufficientCapacityError
      | CartItemNotFoundError
      | SqlError.SqlError
    >

    /**
     * Sets the quantity of a line. Zero removes it, returning Option.none().
     */
    readonly updateItem: (
      ownerId: OwnerId,
      itemId: CartItemId,
      quantity: number
    ) => Effect.Effect<
      Option.Option<CartItem>,
      | CartItemNotFoundError
      | ForbiddenError
      | HolderNotFoundError
      | InsufficientCapacityError
      | SqlError.SqlError
    >

    readonly removeItem: (
      ownerId: OwnerId,
      itemId: CartItemId
    ) => Effect.Effect<void, CartItemNotFoundError | ForbiddenError | SqlError.SqlError>

    /**
     * @returns the number of lines removed
     */
    readonly clear: (ownerId: OwnerId) => Effect.Effect<number, SqlError.SqlError>
  }
>() {}
