import { DateTime } from "effect"
import type { CapacityHolder } from "../domain/CapacityHolder.js"
import type { Aggregate, AggregateWithItems } from "../domain/Aggregate.js"
import type { CartItem, CartView } from "../domain/Cart.js"

// Domain values to snake_case API bodies

export const toHolderResponse = (holder: CapacityHolder) => ({
  id: holder.id,
  kind: holder.kind,
  name: holder.name,
  total_capacity: holder.totalCapacity,
  available_capacity: holder.availableCapacity,
  booked_amount: holder.bookedAmount,
  price_cents: holder.priceCents,
  created_at: DateTime.formatIso(holder.createdAt),
  updated_at: DateTime.formatIso(holder.updatedAt)
})

export const toAggregateSummary = (aggregate: Aggregate) => ({
  id: aggregate.id,
  human_id: aggregate.humanId,
  kind: aggregate.kind,
  owner_id: aggregate.ownerId,
  status: aggregate.status,
  total_amount_cents: aggregate.totalAmountCents,
  created_at: DateTime.formatIso(aggregate.createdAt),
  updated_at: DateTime.formatIso(aggregate.updatedAt)
})

export const toAggregateResponse = ({ aggregate, items }: AggregateWithItems) => ({
  ...toAggregateSummary(aggregate),
  items: items.map((item) => ({
    id: item.id,
    holder_id: item.holderId,
    quantity: item.quantity,
    unit_price_cents: item.unitPriceCents,
    created_at: DateTime.formatIso(item.createdAt)
  }))
})

export const toCartItemResponse = (item: CartItem) => ({
  id: item.id,
  holder_id: item.holderId,
  quantity: item.quantity,
  created_at: DateTime.formatIso(item.createdAt)
})

export const toCartResponse = (cart: CartView) => ({
  items: cart.lines.map((line) => ({
    ...toCartItemResponse(line.item),
    holder_name: line.holderName,
    unit_price_cents: line.unitPriceCents,
    subtotal_cents: line.subtotalCents
  })),
  total_cents: cart.totalCents
})
