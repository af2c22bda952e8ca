import { Layer, Effect, Option } from "effect"
import { LedgerService } from "./LedgerService.js"
import { HolderRepository } from "../repositories/HolderRepository.js"
import { UnitOfWork } from "../repositories/UnitOfWork.js"
import type { HolderId } from "../domain/CapacityHolder.js"
import {
  requirePositiveQuantity,
  resizeCapacity,
  snapshotPrice,
  validateRelease,
  validateReservation
} from "../domain/Ledger.js"
import {
  CapacityOverflowError,
  HolderNotFoundError,
  InsufficientCapacityError
} from "../domain/errors.js"

export const LedgerServiceLive = Layer.effect(
  LedgerService,
  Effect.gen(function* () {
    const holders = yield* HolderRepository
    const uow = yield* UnitOfWork

    // Row lock first, so the check below and the write after it see the same counter
    const lockHolder = (holderId: HolderId) =>
      holders.lockForUpdate([holderId]).pipe(
        Effect.flatMap((rows) => {
          const holder = rows.find((row) => row.id === holderId)
          return holder === undefined
            ? Effect.fail(new HolderNotFoundError({ holderId }))
            : Effect.succeed(holder)
        })
      )

    return {
      validateAndReserve: (holderId: HolderId, quantity: number) =>
        uow.withTransaction(
          Effect.gen(function* () {
            yield* requirePositiveQuantity(holderId, quantity)
            const holder = yield* lockHolder(holderId)
            yield* validateReservation(holder, quantity)

            const updated = yield* holders.applyDelta(holderId, -quantity)
            if (Option.isNone(updated)) {
              return yield* Effect.fail(
                new InsufficientCapacityError({
                  holderId,
                  holderName: holder.name,
                  requested: quantity,
                  available: holder.availableCapacity
                })
              )
            }

            return {
              holderId,
              holderName: holder.name,
              quantity,
              unitPriceCents: snapshotPrice(holder),
              availableAfter: updated.value.availableCapacity
            }
          })
        ).pipe(
          Effect.withSpan("LedgerService.validateAndReserve", {
            attributes: { holderId, quantity }
          })
        ),

      release: (holderId: HolderId, quantity: number) =>
        uow.withTransaction(
          Effect.gen(function* () {
            yield* requirePositiveQuantity(holderId, quantity)
            const holder = yield* lockHolder(holderId)
            yield* validateRelease(holder, quantity)

            const updated = yield* holders.applyDelta(holderId, quantity)
            if (Option.isNone(updated)) {
              return yield* Effect.fail(
                new CapacityOverflowError({
                  holderId,
                  delta: quantity,
                  available: holder.availableCapacity,
                  total: holder.totalCapacity
                })
              )
            }
            return updated.value
          })
        ).pipe(
          Effect.withSpan("LedgerService.release", {
            attributes: { holderId, quantity }
          })
        ),

      adjustTotalCapacity: (holderId: HolderId, newTotal: number) =>
        uow.withTransaction(
          Effect.gen(function* () {
            const holder = yield* lockHolder(holderId)
            const resized = yield* resizeCapacity(holder, newTotal)

            const updated = yield* holders.updateCapacity(holderId, resized)
            if (Option.isNone(updated)) {
              return yield* Effect.fail(new HolderNotFoundError({ holderId }))
            }

            yield* Effect.logInfo("Holder capacity adjusted", {
              holderId,
              previousTotal: holder.totalCapacity,
              newTotal,
              booked: holder.bookedAmount
            })
            return updated.value
          })
        ).pipe(
          Effect.withSpan("LedgerService.adjustTotalCapacity", {
            attributes: { holderId, newTotal }
          })
        )
    }
  })
)
