import { Context, Effect } from "effect"
import { SqlError } from "@effect/sql"
import type { CapacityHolder, HolderId } from "../domain/CapacityHolder.js"
import type { ReservedLine } from "../domain/Reservation.js"
import type {
  CapacityOverflowError,
  HolderNotFoundError,
  InsufficientCapacityError,
  InvalidCapacityError,
  InvalidQuantityError
} from "../domain/errors.js"

export class LedgerService extends Context.Tag("LedgerService")<
  LedgerService,
  {
    /**
     * Locks the holder, checks the quantity fits, and takes it off the
     * available counter. Joins the caller's transaction when there is one.
     * A quantity that is not a positive integer fails `InvalidQuantityError`.
     *
     * @returns the reserved line with the price captured at this moment
     */
    readonly validateAndReserve: (
      holderId: HolderId,
      quantity: number
    ) => Effect.Effect<
      ReservedLine,
      InsufficientCapacityError | InvalidQuantityError | HolderNotFoundError | SqlError.SqlError
    >

    /**
     * Gives `quantity` back to the holder's available counter.
     */
    readonly release: (
      holderId: HolderId,
      quantity: number
    ) => Effect.Effect<
      CapacityHolder,
      CapacityOverflowError | InvalidQuantityError | HolderNotFoundError | SqlError.SqlError
    >

    /**
     * Sets a new total, keeping the booked quantity. Fails when the new total
     * is below what is already booked.
     */
    readonly adjustTotalCapacity: (
      holderId: HolderId,
      newTotal: number
    ) => Effect.Effect<
      CapacityHolder,
      InvalidCapacityError | HolderNotFoundError | SqlError.SqlError
    >
  }
>() {}
