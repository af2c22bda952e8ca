import { Layer, Effect, Option, DateTime, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { CartRepository, type CreateCartItemRow } from "./CartRepository.js"
import { CartItem, CartItemId } from "../domain/Cart.js"
import { OwnerId } from "../domain/Aggregate.js"
import { HolderId } from "../domain/CapacityHolder.js"

export interface CartItemRow {
  id: string
  owner_id: string
  holder_id: string
  quantity: number
  created_at: Date
}

export const mapRowToCartItem = (row: CartItemRow): CartItem =>
  new CartItem({
    id: Schema.decodeUnknownSync(CartItemId)(row.id),
    ownerId: Schema.decodeUnknownSync(OwnerId)(row.owner_id),
    holderId: Schema.decodeUnknownSync(HolderId)(row.holder_id),
    quantity: row.quantity,
    createdAt: DateTime.unsafeFromDate(row.created_at)
  })

const firstItem = (rows: ReadonlyArray<CartItemRow>): Option.Option<CartItem> =>
  Option.map(Option.fromNullable(rows[0]), mapRowToCartItem)

export const CartRepositoryLive = Layer.effect(
  CartRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      listByOwner: (ownerId: OwnerId) =>
        sql<CartItemRow>`
          SELECT * FROM cart_items
          WHERE owner_id = ${ownerId}::uuid
          ORDER BY created_at, id
        `.pipe(Effect.map((rows) => rows.map(mapRowToCartItem))),

      findById: (id: CartItemId) =>
        sql<CartItemRow>`
          SELECT * FROM cart_items WHERE id = ${id}::uuid
        `.pipe(Effect.map(firstItem)),

      findByOwnerAndHolder: (ownerId: OwnerId, holderId: HolderId) =>
        sql<CartItemRow>`
          SELECT * FROM cart_items
          WHERE owner_id = ${ownerId}::uuid AND holder_id = ${holderId}::uuid
        `.pipe(Effect.map(firstItem)),

      insert: (row: CreateCartItemRow) =>
        Effect.gen(function* () {
          const result = yield* sql<CartItemRow>`
            INSERT INTO cart_items (owner_id, holder_id, quantity)
            VALUES (${row.ownerId}::uuid, ${row.holderId}::uuid, ${row.quantity})
            RETURNING *
          `
          const inserted = result[0]
          if (inserted === undefined) {
            return yield* Effect.die(new Error("INSERT cart_items returned no row"))
          }
          return mapRowToCartItem(inserted)
        }),

      updateQuantity: (id: CartItemId, quantity: number) =>
        sql<CartItemRow>`
          UPDATE cart_items SET quantity = ${quantity}
          WHERE id = ${id}::uuid
          RETURNING *
        `.pipe(Effect.map(firstItem)),

      delete: (id: CartItemId) =>
        sql`DELETE FROM cart_items WHERE id = ${id}::uuid`.pipe(Effect.asVoid),

      clearByOwner: (ownerId: OwnerId) =>
        sql<{ id: string }>`
          DELETE FROM cart_items WHERE owner_id = ${ownerId}::uuid
          RETURNING id
        `.pipe(Effect.map((rows) => rows.length))
    }
  })
)
