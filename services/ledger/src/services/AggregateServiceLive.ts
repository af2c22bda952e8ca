import { Layer, Effect } from "effect"
import {
  AggregateService,
  type LineItem,
  type ListAggregatesOptions
} from "./AggregateService.js"
import { LedgerService } from "./LedgerService.js"
import { fromOption } from "./HolderServiceLive.js"
import { AggregateRepository } from "../repositories/AggregateRepository.js"
import { CartRepository } from "../repositories/CartRepository.js"
import { HolderRepository } from "../repositories/HolderRepository.js"
import { UnitOfWork } from "../repositories/UnitOfWork.js"
import { HumanIdGenerator } from "../domain/HumanId.js"
import type {
  Aggregate,
  AggregateId,
  AggregateKind,
  AggregateStatus,
  OwnerId
} from "../domain/Aggregate.js"
import type { Requester } from "../domain/Identity.js"
import type { ReservedLine } from "../domain/Reservation.js"
import { checkHolderKind, checkTotalAmount, totalAmountCents } from "../domain/Ledger.js"
import { INITIAL_STATUS, canCancel, isValidTransition } from "../domain/AggregateLifecycle.js"
import {
  AggregateNotFoundError,
  EmptyInputError,
  ForbiddenError,
  HolderNotFoundError,
  InvalidStatusTransitionError
} from "../domain/errors.js"

export const AggregateServiceLive = Layer.effect(
  AggregateService,
  Effect.gen(function* () {
    const aggregates = yield* AggregateRepository
    const holders = yield* HolderRepository
    const carts = yield* CartRepository
    const ledger = yield* LedgerService
    const uow = yield* UnitOfWork
    const humanIds = yield* HumanIdGenerator

    // Runs inside the caller's transaction
    const commit = (
      ownerId: OwnerId,
      kind: AggregateKind,
      items: ReadonlyArray<LineItem>,
      source: "request" | "cart"
    ) =>
      Effect.gen(function* () {
        if (items.length === 0) {
          return yield* Effect.fail(new EmptyInputError({ source }))
        }

        // Locks are taken in id order; lines are still checked in input order
        const holderIds = [...new Set(items.map((item) => item.holderId))].sort()
        const locked = yield* holders.lockForUpdate(holderIds)
        const byId = new Map(locked.map((holder) => [holder.id, holder]))

        const reserved: ReservedLine[] = []
        for (const item of items) {
          const holder = byId.get(item.holderId)
          if (holder === undefined) {
            return yield* Effect.fail(new HolderNotFoundError({ holderId: item.holderId }))
          }
          yield* checkHolderKind(holder, kind)
          reserved.push(yield* ledger.validateAndReserve(item.holderId, item.quantity))
        }

        const total = yield* checkTotalAmount(totalAmountCents(reserved))
        const humanId = yield* humanIds.next(kind)
        return yield* aggregates.insertWithItems({
          humanId,
          kind,
          ownerId,
          status: INITIAL_STATUS[kind],
          totalAmountCents: total,
          items: reserved.map((line) => ({
            holderId: line.holderId,
            quantity: line.quantity,
            unitPriceCents: line.unitPriceCents
          }))
        })
      })

    const withItems = (aggregate: Aggregate) =>
      aggregates.getItems(aggregate.id).pipe(
        Effect.map((items) => ({ aggregate, items }))
      )

    const authorize = (aggregate: Aggregate, requester: Requester) =>
      requester.isAdmin || aggregate.ownerId === requester.userId
        ? Effect.succeed(aggregate)
        : Effect.fail(
            new ForbiddenError({
              requesterId: requester.userId,
              resource: `aggregate:${aggregate.id}`
            })
          )

    const logCommitted = (source: "request" | "cart") =>
      ({ aggregate, items }: { aggregate: Aggregate; items: ReadonlyArray<unknown> }) =>
        Effect.logInfo("Aggregate committed", {
          aggregateId: aggregate.id,
          humanId: aggregate.humanId,
          kind: aggregate.kind,
          ownerId: aggregate.ownerId,
          lineItems: items.length,
          totalAmountCents: aggregate.totalAmountCents,
          source
        })

    return {
      createAggregate: (ownerId: OwnerId, kind: AggregateKind, items: ReadonlyArray<LineItem>) =>
        uow.withTransaction(commit(ownerId, kind, items, "request")).pipe(
          Effect.tap(logCommitted("request")),
          Effect.withSpan("AggregateService.createAggregate", {
            attributes: { ownerId, kind, lineItems: items.length }
          })
        ),

      checkoutCart: (ownerId: OwnerId) =>
        uow.withTransaction(
          Effect.gen(function* () {
            const cart = yield* carts.listByOwner(ownerId)
            const result = yield* commit(
              ownerId,
              "ORDER",
              cart.map((item) => ({ holderId: item.holderId, quantity: item.quantity })),
              "cart"
            )
            yield* carts.clearByOwner(ownerId)
            return result
          })
        ).pipe(
          Effect.tap(logCommitted("cart")),
          Effect.withSpan("AggregateService.checkoutCart", { attributes: { ownerId } })
        ),

      getAggregateById: (id: AggregateId, requester: Requester) =>
        aggregates.findById(id).pipe(
          Effect.flatMap(fromOption(() => new AggregateNotFoundError({ aggregateId: id, searchedBy: "id" }))),
          Effect.flatMap((aggregate) => authorize(aggregate, requester)),
          Effect.flatMap(withItems)
        ),

      getAggregateByHumanId: (humanId: string, requester: Requester) =>
        aggregates.findByHumanId(humanId).pipe(
          Effect.flatMap(
            fromOption(() => new AggregateNotFoundError({ aggregateId: humanId, searchedBy: "humanId" }))
          ),
          Effect.flatMap((aggregate) => authorize(aggregate, requester)),
          Effect.flatMap(withItems)
        ),

      listForOwner: (ownerId: OwnerId, options: ListAggregatesOptions) =>
        aggregates.listByOwner(ownerId, {
          kind: options.kind,
          offset: options.page * options.size,
          limit: options.size
        }),

      updateStatus: (id: AggregateId, status: AggregateStatus) =>
        uow.withTransaction(
          Effect.gen(function* () {
            const aggregate = yield* aggregates.findByIdForUpdate(id).pipe(
              Effect.flatMap(fromOption(() => new AggregateNotFoundError({ aggregateId: id, searchedBy: "id" })))
            )

            if (aggregate.status === status) {
              yield* Effect.logInfo("Aggregate already in requested status", { aggregateId: id, status })
              return yield* withItems(aggregate)
            }

            if (status === "CANCELLED" || !isValidTransition(aggregate.kind, aggregate.status, status)) {
              return yield* Effect.fail(
                new InvalidStatusTransitionError({
                  aggregateId: id,
                  currentStatus: aggregate.status,
                  attemptedStatus: status
                })
              )
            }

            const updated = yield* aggregates.updateStatus(id, status).pipe(
              Effect.flatMap(fromOption(() => new AggregateNotFoundError({ aggregateId: id, searchedBy: "id" })))
            )
            yield* Effect.logInfo("Aggregate status updated", {
              aggregateId: id,
              from: aggregate.status,
              to: status
            })
            return yield* withItems(updated)
          })
        ).pipe(Effect.withSpan("AggregateService.updateStatus", { attributes: { aggregateId: id, status } })),

      cancel: (id: AggregateId, requester: Requester) =>
        uow.withTransaction(
          Effect.gen(function* () {
            const aggregate = yield* aggregates.findByIdForUpdate(id).pipe(
              Effect.flatMap(fromOption(() => new AggregateNotFoundError({ aggregateId: id, searchedBy: "id" }))),
              Effect.flatMap((found) => authorize(found, requester))
            )

            if (aggregate.status === "CANCELLED") {
              yield* Effect.logInfo("Aggregate already cancelled (idempotent)", { aggregateId: id })
              return yield* withItems(aggregate)
            }

            if (!canCancel(aggregate.kind, aggregate.status)) {
              return yield* Effect.fail(
                new InvalidStatusTransitionError({
                  aggregateId: id,
                  currentStatus: aggregate.status,
                  attemptedStatus: "CANCELLED"
                })
              )
            }

            const items = yield* aggregates.getItems(id)
            // Same lock order as commits
            const byHolder = [...items].sort((a, b) => (a.holderId < b.holderId ? -1 : a.holderId > b.holderId ? 1 : 0))
            for (const item of byHolder) {
              yield* ledger.release(item.holderId, item.quantity)
            }

            const cancelled = yield* aggregates.updateStatus(id, "CANCELLED").pipe(
              Effect.flatMap(fromOption(() => new AggregateNotFoundError({ aggregateId: id, searchedBy: "id" })))
            )
            yield* Effect.logInfo("Aggregate cancelled", {
              aggregateId: id,
              previousStatus: aggregate.status,
              releasedLines: items.length
            })
            return { aggregate: cancelled, items }
          })
        ).pipe(Effect.withSpan("AggregateService.cancel", { attributes: { aggregateId: id } }))
    }
  })
)
