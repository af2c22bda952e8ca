import { Either } from "effect"
import type { CapacityHolder, HolderKind } from "./CapacityHolder.js"
import type { AggregateKind } from "./Aggregate.js"
import {
  AmountTooLargeError,
  CapacityOverflowError,
  HolderKindMismatchError,
  InsufficientCapacityError,
  InvalidCapacityError,
  InvalidQuantityError
} from "./errors.js"

// Reserve and release only ever move whole, positive quantities
export const requirePositiveQuantity = (
  holderId: string,
  quantity: number
): Either.Either<number, InvalidQuantityError> =>
  Number.isSafeInteger(quantity) && quantity > 0
    ? Either.right(quantity)
    : Either.left(new InvalidQuantityError({ holderId, quantity }))

/**
 * Reservation check: the requested quantity must fit in what is left.
 * Reads only; callers run it against a row already locked for update.
 */
export const validateReservation = (
  holder: CapacityHolder,
  requested: number
): Either.Either<CapacityHolder, InsufficientCapacityError> =>
  requested <= holder.availableCapacity
    ? Either.right(holder)
    : Either.left(
        new InsufficientCapacityError({
          holderId: holder.id,
          holderName: holder.name,
          requested,
          available: holder.availableCapacity
        })
      )

/**
 * Computes the available counter after a signed delta (negative consumes,
 * positive releases). The result must stay within [0, totalCapacity].
 */
export const applyDelta = (
  holder: CapacityHolder,
  delta: number
): Either.Either<number, InsufficientCapacityError | CapacityOverflowError> => {
  const next = holder.availableCapacity + delta

  if (next < 0) {
    return Either.left(
      new InsufficientCapacityError({
        holderId: holder.id,
        holderName: holder.name,
        requested: -delta,
        available: holder.availableCapacity
      })
    )
  }

  if (next > holder.totalCapacity) {
    return Either.left(
      new CapacityOverflowError({
        holderId: holder.id,
        delta,
        available: holder.availableCapacity,
        total: holder.totalCapacity
      })
    )
  }

  return Either.right(next)
}

/**
 * Release check: giving `quantity` back must not lift the counter above the total.
 */
export const validateRelease = (
  holder: CapacityHolder,
  quantity: number
): Either.Either<number, CapacityOverflowError> => {
  const next = holder.availableCapacity + quantity
  return next <= holder.totalCapacity
    ? Either.right(next)
    : Either.left(
        new CapacityOverflowError({
          holderId: holder.id,
          delta: quantity,
          available: holder.availableCapacity,
          total: holder.totalCapacity
        })
      )
}

export interface ResizedCapacity {
  readonly totalCapacity: number
  readonly availableCapacity: number
}

/**
 * New counters for an administrative resize. Booked quantity is preserved, so
 * the total may not drop below it.
 */
export const resizeCapacity = (
  holder: CapacityHolder,
  newTotal: number
): Either.Either<ResizedCapacity, InvalidCapacityError> => {
  const booked = holder.bookedAmount
  if (newTotal < booked) {
    return Either.left(
      new InvalidCapacityError({
        holderId: holder.id,
        requestedTotal: newTotal,
        bookedAmount: booked
      })
    )
  }
  return Either.right({ totalCapacity: newTotal, availableCapacity: newTotal - booked })
}

// Unpriced holders (free events) snapshot at zero
export const snapshotPrice = (holder: CapacityHolder): number => holder.priceCents ?? 0

export const totalAmountCents = (
  lines: ReadonlyArray<{ readonly quantity: number; readonly unitPriceCents: number }>
): number => lines.reduce((sum, line) => sum + line.quantity * line.unitPriceCents, 0)

// Totals are stored as BIGINT and carried as numbers, so they must stay exact
export const checkTotalAmount = (
  totalAmountCents: number
): Either.Either<number, AmountTooLargeError> =>
  Number.isSafeInteger(totalAmountCents)
    ? Either.right(totalAmountCents)
    : Either.left(new AmountTooLargeError({ totalAmountCents }))

const HOLDER_KIND_FOR: Record<AggregateKind, HolderKind> = {
  ORDER: "PRODUCT",
  BOOKING: "EVENT"
}

export const holderKindFor = (kind: AggregateKind): HolderKind => HOLDER_KIND_FOR[kind]

export const checkHolderKind = (
  holder: CapacityHolder,
  kind: AggregateKind
): Either.Either<CapacityHolder, HolderKindMismatchError> => {
  const expected = holderKindFor(kind)
  return holder.kind === expected
    ? Either.right(holder)
    : Either.left(
        new HolderKindMismatchError({
          holderId: holder.id,
          expectedKind: expected,
          actualKind: holder.kind
        })
      )
}
