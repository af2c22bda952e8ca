import { Schema } from "effect"
import { MAX_INT4, Uuid, int4Message } from "./Primitives.js"
import { HolderId } from "./CapacityHolder.js"
import { OwnerId } from "./Aggregate.js"

export const CartItemId = Uuid.pipe(Schema.brand("CartItemId"))
export type CartItemId = typeof CartItemId.Type

export class CartItem extends Schema.Class<CartItem>("CartItem")({
  id: CartItemId,
  ownerId: OwnerId,
  holderId: HolderId,
  quantity: Schema.Int.pipe(Schema.positive()),
  createdAt: Schema.DateTimeUtc
}) {}

// Cart line priced at the holder's current price, for display only
export interface CartLine {
  readonly item: CartItem
  readonly holderName: string
  readonly unitPriceCents: number
  readonly subtotalCents: number
}

export interface CartView {
  readonly lines: ReadonlyArray<CartLine>
  readonly totalCents: number
}

export class AddCartItemRequest extends Schema.Class<AddCartItemRequest>("AddCartItemRequest")({
  holderId: HolderId,
  quantity: Schema.Int.pipe(
    Schema.positive({ message: () => "Quantity must be positive" }),
    Schema.lessThanOrEqualTo(MAX_INT4, { message: int4Message })
  )
}) {}

export class UpdateCartItemRequest extends Schema.Class<UpdateCartItemRequest>("UpdateCartItemRequest")({
  quantity: Schema.Int.pipe(
    Schema.nonNegative({ message: () => "Quantity cannot be negative" }),
    Schema.lessThanOrEqualTo(MAX_INT4, { message: int4Message })
  )
}) {}

export const CartItemIdParams = Schema.Struct({
  item_id: CartItemId
})
