import { describe, it, expect } from "vitest"
import { Effect, Either, Exit, Option, Ref, Schema } from "effect"
import { AggregateService } from "../services/AggregateService.js"
import { CartService } from "../services/CartService.js"
import { HolderService } from "../services/HolderService.js"
import { CreateHolderRequest, type HolderId, type HolderKind } from "../domain/CapacityHolder.js"
import { AggregateId, CreateOrderRequest } from "../domain/Aggregate.js"
import { IdentityHeaders, Requester } from "../domain/Identity.js"
import { HUMAN_ID_PATTERN } from "../domain/HumanId.js"
import { MemoryStore, TestServicesLive, runTest } from "./support/MemoryStore.js"
import { admin, customerX, customerY, holderIdA, ownerX, ownerY } from "./support/fixtures.js"

const seedHolder = (
  name: string,
  totalCapacity: number,
  options: { readonly kind?: HolderKind; readonly priceCents?: number | null } = {}
) =>
  Effect.flatMap(HolderService, (holders) =>
    holders.create(
      new CreateHolderRequest({
        kind: options.kind ?? "PRODUCT",
        name,
        totalCapacity,
        priceCents: options.priceCents === undefined ? 1000 : options.priceCents
      })
    )
  )

const availableOf = (holderId: HolderId) =>
  Effect.flatMap(HolderService, (holders) => holders.findById(holderId)).pipe(
    Effect.map((holder) => holder.availableCapacity)
  )

const unknownAggregateId = AggregateId.make("660e8400-e29b-41d4-a716-446655440099")

describe("AggregateService", () => {
  describe("createAggregate", () => {
    it("should commit an order with price snapshots and a human id", () =>
      runTest(
        Effect.gen(function* () {
          const widget = yield* seedHolder("Widget", 10, { priceCents: 2999 })
          const gadget = yield* seedHolder("Gadget", 5, { priceCents: 500 })
          const service = yield* AggregateService

          const { aggregate, items } = yield* service.createAggregate(ownerX, "ORDER", [
            { holderId: widget.id, quantity: 2 },
            { holderId: gadget.id, quantity: 1 }
          ])

          expect(aggregate.kind).toBe("ORDER")
          expect(aggregate.status).toBe("CREATED")
          expect(aggregate.ownerId).toBe(ownerX)
          expect(aggregate.totalAmountCents).toBe(6498)
          expect(aggregate.humanId).toMatch(HUMAN_ID_PATTERN)
          expect(aggregate.humanId.startsWith("ORD-")).toBe(true)
          expect(items.map((item) => [item.holderId, item.quantity, item.unitPriceCents])).toEqual([
            [widget.id, 2, 2999],
            [gadget.id, 1, 500]
          ])
          expect(yield* availableOf(widget.id)).toBe(8)
          expect(yield* availableOf(gadget.id)).toBe(4)
        })
      ))

    it("should keep line items in input order", () =>
      runTest(
        Effect.gen(function* () {
          const first = yield* seedHolder("First", 10)
          const second = yield* seedHolder("Second", 10)
          const service = yield* AggregateService

          const { items } = yield* service.createAggregate(ownerX, "ORDER", [
            { holderId: second.id, quantity: 1 },
            { holderId: first.id, quantity: 2 },
            { holderId: second.id, quantity: 3 }
          ])

          expect(items.map((item) => item.holderId)).toEqual([second.id, first.id, second.id])
          expect(yield* availableOf(second.id)).toBe(6)
        })
      ))

    it("should commit a booking as CONFIRMED with an EVT id", () =>
      runTest(
        Effect.gen(function* () {
          const hall = yield* seedHolder("Main Hall", 100, { kind: "EVENT", priceCents: null })
          const service = yield* AggregateService

          const { aggregate } = yield* service.createAggregate(ownerX, "BOOKING", [
            { holderId: hall.id, quantity: 4 }
          ])

          expect(aggregate.status).toBe("CONFIRMED")
          expect(aggregate.humanId.startsWith("EVT-")).toBe(true)
          expect(aggregate.totalAmountCents).toBe(0)
          expect(yield* availableOf(hall.id)).toBe(96)
        })
      ))

    it("should roll back every line when one line does not fit", () =>
      runTest(
        Effect.gen(function* () {
          const holderA = yield* seedHolder("A", 10)
          const holderB = yield* seedHolder("B", 5)
          const service = yield* AggregateService
          const { state } = yield* MemoryStore

          const error = yield* Effect.flip(
            service.createAggregate(ownerX, "ORDER", [
              { holderId: holderA.id, quantity: 2 },
              { holderId: holderB.id, quantity: 999 }
            ])
          )

          expect(error).toMatchObject({
            _tag: "InsufficientCapacityError",
            holderId: holderB.id,
            holderName: "B",
            requested: 999,
            available: 5
          })
          expect(yield* availableOf(holderA.id)).toBe(10)
          expect(yield* availableOf(holderB.id)).toBe(5)
          const after = yield* Ref.get(state)
          expect(after.aggregates).toHaveLength(0)
          expect(after.reservations).toHaveLength(0)
        })
      ))

    it("should check repeated lines for the same holder cumulatively", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 6)
          const service = yield* AggregateService

          const error = yield* Effect.flip(
            service.createAggregate(ownerX, "ORDER", [
              { holderId: holder.id, quantity: 4 },
              { holderId: holder.id, quantity: 4 }
            ])
          )

          expect(error).toMatchObject({ _tag: "InsufficientCapacityError", requested: 4, available: 2 })
          expect(yield* availableOf(holder.id)).toBe(6)
        })
      ))

    it("should reject an empty commit", () =>
      runTest(
        Effect.gen(function* () {
          const service = yield* AggregateService

          const error = yield* Effect.flip(service.createAggregate(ownerX, "ORDER", []))

          expect(error).toMatchObject({ _tag: "EmptyInputError", source: "request" })
        })
      ))

    it("should fail for an unknown holder and leave other holders untouched", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService

          const error = yield* Effect.flip(
            service.createAggregate(ownerX, "ORDER", [
              { holderId: holder.id, quantity: 1 },
              { holderId: holderIdA, quantity: 1 }
            ])
          )

          expect(error).toMatchObject({ _tag: "HolderNotFoundError", holderId: holderIdA })
          expect(yield* availableOf(holder.id)).toBe(10)
        })
      ))

    it("should refuse to book seats on a product", () =>
      runTest(
        Effect.gen(function* () {
          const widget = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService

          const error = yield* Effect.flip(
            service.createAggregate(ownerX, "BOOKING", [{ holderId: widget.id, quantity: 1 }])
          )

          expect(error).toMatchObject({
            _tag: "HolderKindMismatchError",
            expectedKind: "EVENT",
            actualKind: "PRODUCT"
          })
          expect(yield* availableOf(widget.id)).toBe(10)
        })
      ))

    it("should never over-commit under concurrent requests", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Limited", 20)
          const service = yield* AggregateService

          const results = yield* Effect.all(
            Array.from({ length: 10 }, () =>
              service.createAggregate(ownerX, "ORDER", [{ holderId: holder.id, quantity: 3 }])
            ),
            { concurrency: "unbounded", mode: "either" }
          )

          // floor(20 / 3)
          expect(results.filter(Either.isRight)).toHaveLength(6)
          expect(yield* availableOf(holder.id)).toBe(2)
        })
      ))
  })

  describe("capacity accounting", () => {
    it("should keep booked capacity equal to non-cancelled reservations", () =>
      runTest(
        Effect.gen(function* () {
          const holderA = yield* seedHolder("A", 10)
          const holderB = yield* seedHolder("B", 8)
          const service = yield* AggregateService
          const { state } = yield* MemoryStore

          yield* service.createAggregate(ownerX, "ORDER", [
            { holderId: holderA.id, quantity: 3 },
            { holderId: holderB.id, quantity: 2 }
          ])
          const second = yield* service.createAggregate(ownerY, "ORDER", [{ holderId: holderA.id, quantity: 4 }])
          yield* service.createAggregate(ownerY, "ORDER", [{ holderId: holderB.id, quantity: 5 }])
          yield* service.cancel(second.aggregate.id, customerY)

          const snapshot = yield* Ref.get(state)
          const live = new Set<string>(
            snapshot.aggregates.filter((a) => a.status !== "CANCELLED").map((a) => a.id)
          )
          for (const holder of snapshot.holders.values()) {
            const reserved = snapshot.reservations
              .filter((r) => r.holderId === holder.id && live.has(r.aggregateId))
              .reduce((sum, r) => sum + r.quantity, 0)
            expect(holder.bookedAmount).toBe(reserved)
            expect(holder.availableCapacity).toBeGreaterThanOrEqual(0)
            expect(holder.availableCapacity).toBeLessThanOrEqual(holder.totalCapacity)
          }
        })
      ))

    it("should not reprice committed aggregates when the holder price changes", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10, { priceCents: 500 })
          const holders = yield* HolderService
          const service = yield* AggregateService
          const created = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: holder.id, quantity: 2 }])

          yield* holders.updatePrice(holder.id, 900)
          const { aggregate, items } = yield* service.getAggregateById(created.aggregate.id, customerX)

          expect(aggregate.totalAmountCents).toBe(1000)
          expect(items[0]?.unitPriceCents).toBe(500)
        })
      ))
  })

  describe("checkoutCart", () => {
    it("should commit the cart as an order and empty it", () =>
      runTest(
        Effect.gen(function* () {
          const widget = yield* seedHolder("Widget", 10, { priceCents: 250 })
          const gadget = yield* seedHolder("Gadget", 10, { priceCents: 100 })
          const cart = yield* CartService
          const service = yield* AggregateService
          yield* cart.addItem(ownerX, gadget.id, 1)
          yield* cart.addItem(ownerX, widget.id, 2)

          const { aggregate, items } = yield* service.checkoutCart(ownerX)

          expect(aggregate.kind).toBe("ORDER")
          expect(aggregate.totalAmountCents).toBe(600)
          expect(items.map((item) => item.holderId)).toEqual([gadget.id, widget.id])
          expect((yield* cart.getCart(ownerX)).lines).toHaveLength(0)
          expect(yield* availableOf(widget.id)).toBe(8)
        })
      ))

    it("should leave the cart alone when the commit fails", () =>
      runTest(
        Effect.gen(function* () {
          const widget = yield* seedHolder("Widget", 5)
          const cart = yield* CartService
          const service = yield* AggregateService
          yield* cart.addItem(ownerX, widget.id, 5)
          yield* service.createAggregate(ownerY, "ORDER", [{ holderId: widget.id, quantity: 3 }])

          const error = yield* Effect.flip(service.checkoutCart(ownerX))

          expect(error).toMatchObject({ _tag: "InsufficientCapacityError", requested: 5, available: 2 })
          expect((yield* cart.getCart(ownerX)).lines).toHaveLength(1)
          expect(yield* availableOf(widget.id)).toBe(2)
        })
      ))

    it("should reject an empty cart", () =>
      runTest(
        Effect.gen(function* () {
          const service = yield* AggregateService

          const error = yield* Effect.flip(service.checkoutCart(ownerX))

          expect(error).toMatchObject({ _tag: "EmptyInputError", source: "cart" })
        })
      ))
  })

  describe("getAggregateById", () => {
    it("should return the same data on repeated reads", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const created = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: holder.id, quantity: 1 }])

          const first = yield* service.getAggregateById(created.aggregate.id, customerX)
          const second = yield* service.getAggregateById(created.aggregate.id, customerX)

          expect(second).toEqual(first)
          expect(first.aggregate.id).toBe(created.aggregate.id)
        })
      ))

    it("should refuse another owner's aggregate", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const created = yield* service.createAggregate(ownerY, "ORDER", [{ holderId: holder.id, quantity: 1 }])

          const error = yield* Effect.flip(service.getAggregateById(created.aggregate.id, customerX))

          expect(error).toMatchObject({ _tag: "ForbiddenError", requesterId: ownerX })
        })
      ))

    it("should let an admin read any aggregate", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const created = yield* service.createAggregate(ownerY, "ORDER", [{ holderId: holder.id, quantity: 1 }])

          const { aggregate } = yield* service.getAggregateById(created.aggregate.id, admin)

          expect(aggregate.ownerId).toBe(ownerY)
        })
      ))

    it("should fail with AggregateNotFound for an unknown id", async () => {
      const exit = await Effect.runPromiseExit(
        Effect.provide(
          Effect.flatMap(AggregateService, (service) => service.getAggregateById(unknownAggregateId, customerX)),
          TestServicesLive
        )
      )

      expect(Exit.isFailure(exit)).toBe(true)
      if (Exit.isFailure(exit) && exit.cause._tag === "Fail") {
        expect(exit.cause.error._tag).toBe("AggregateNotFoundError")
      }
    })
  })

  describe("identifiers sent in uppercase", () => {
    it("should resolve the holder and recognise the owner", () =>
      runTest(
        Effect.gen(function* () {
          const widget = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const body = Schema.decodeUnknownSync(CreateOrderRequest)({
            items: [{ holderId: widget.id.toUpperCase(), quantity: 1 }]
          })
          const headers = Schema.decodeUnknownSync(IdentityHeaders)({ "x-user-id": ownerX.toUpperCase() })
          const requester = new Requester({ userId: headers["x-user-id"], role: headers["x-user-role"] })

          const created = yield* service.createAggregate(requester.userId, "ORDER", body.items)
          const read = yield* service.getAggregateById(created.aggregate.id, requester)

          expect(created.items.map((item) => item.holderId)).toEqual([widget.id])
          expect(read.aggregate.ownerId).toBe(ownerX)
          expect(yield* availableOf(widget.id)).toBe(9)
        })
      ))
  })

  describe("getAggregateByHumanId", () => {
    it("should find an aggregate by its human id", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const created = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: holder.id, quantity: 1 }])

          const found = yield* service.getAggregateByHumanId(created.aggregate.humanId, customerX)

          expect(found.aggregate.id).toBe(created.aggregate.id)
        })
      ))

    it("should report the human id when nothing matches", () =>
      runTest(
        Effect.gen(function* () {
          const service = yield* AggregateService

          const error = yield* Effect.flip(service.getAggregateByHumanId("ORD-1-ABCDEFGH", customerX))

          expect(error).toMatchObject({
            _tag: "AggregateNotFoundError",
            aggregateId: "ORD-1-ABCDEFGH",
            searchedBy: "humanId"
          })
        })
      ))
  })

  describe("listForOwner", () => {
    it("should list only the owner's aggregates, newest first, paged", () =>
      runTest(
        Effect.gen(function* () {
          const widget = yield* seedHolder("Widget", 100)
          const hall = yield* seedHolder("Hall", 100, { kind: "EVENT" })
          const service = yield* AggregateService
          const first = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: widget.id, quantity: 1 }])
          const second = yield* service.createAggregate(ownerX, "BOOKING", [{ holderId: hall.id, quantity: 1 }])
          const third = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: widget.id, quantity: 1 }])
          yield* service.createAggregate(ownerY, "ORDER", [{ holderId: widget.id, quantity: 1 }])

          const all = yield* service.listForOwner(ownerX, { page: 0, size: 10, kind: Option.none() })
          const bookings = yield* service.listForOwner(ownerX, { page: 0, size: 10, kind: Option.some("BOOKING") })
          const secondPage = yield* service.listForOwner(ownerX, { page: 1, size: 2, kind: Option.none() })

          expect(all.map((a) => a.id)).toEqual([third.aggregate.id, second.aggregate.id, first.aggregate.id])
          expect(bookings.map((a) => a.id)).toEqual([second.aggregate.id])
          expect(secondPage.map((a) => a.id)).toEqual([first.aggregate.id])
        })
      ))
  })

  describe("updateStatus", () => {
    it("should follow the order lifecycle", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const { aggregate } = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: holder.id, quantity: 1 }])

          const confirmed = yield* service.updateStatus(aggregate.id, "CONFIRMED")
          const preparing = yield* service.updateStatus(aggregate.id, "PREPARING")

          expect(confirmed.aggregate.status).toBe("CONFIRMED")
          expect(preparing.aggregate.status).toBe("PREPARING")
          expect(preparing.items).toHaveLength(1)
        })
      ))

    it("should treat setting the current status as a no-op", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const { aggregate } = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: holder.id, quantity: 1 }])

          const result = yield* service.updateStatus(aggregate.id, "CREATED")

          expect(result.aggregate).toEqual(aggregate)
        })
      ))

    it("should reject a skipped step", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const { aggregate } = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: holder.id, quantity: 1 }])

          const error = yield* Effect.flip(service.updateStatus(aggregate.id, "DELIVERED"))

          expect(error).toMatchObject({
            _tag: "InvalidStatusTransitionError",
            currentStatus: "CREATED",
            attemptedStatus: "DELIVERED"
          })
        })
      ))

    it("should route cancellation through cancel", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const { aggregate } = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: holder.id, quantity: 1 }])

          const error = yield* Effect.flip(service.updateStatus(aggregate.id, "CANCELLED"))

          expect(error._tag).toBe("InvalidStatusTransitionError")
          expect(yield* availableOf(holder.id)).toBe(9)
        })
      ))

    it("should fail for an unknown aggregate", () =>
      runTest(
        Effect.gen(function* () {
          const service = yield* AggregateService

          const error = yield* Effect.flip(service.updateStatus(unknownAggregateId, "CONFIRMED"))

          expect(error).toMatchObject({ _tag: "AggregateNotFoundError", searchedBy: "id" })
        })
      ))
  })

  describe("cancel", () => {
    it("should release every line back to its holder", () =>
      runTest(
        Effect.gen(function* () {
          const holderA = yield* seedHolder("A", 10)
          const holderB = yield* seedHolder("B", 10)
          const service = yield* AggregateService
          const { aggregate } = yield* service.createAggregate(ownerX, "ORDER", [
            { holderId: holderA.id, quantity: 3 },
            { holderId: holderB.id, quantity: 2 },
            { holderId: holderA.id, quantity: 1 }
          ])

          const cancelled = yield* service.cancel(aggregate.id, customerX)

          expect(cancelled.aggregate.status).toBe("CANCELLED")
          expect(cancelled.items).toHaveLength(3)
          expect(yield* availableOf(holderA.id)).toBe(10)
          expect(yield* availableOf(holderB.id)).toBe(10)
        })
      ))

    it("should be idempotent", () =>
      runTest(
        Effect.gen(function* () {
          const hall = yield* seedHolder("Hall", 50, { kind: "EVENT" })
          const service = yield* AggregateService
          const { aggregate } = yield* service.createAggregate(ownerX, "BOOKING", [{ holderId: hall.id, quantity: 5 }])

          yield* service.cancel(aggregate.id, customerX)
          const again = yield* service.cancel(aggregate.id, customerX)

          expect(again.aggregate.status).toBe("CANCELLED")
          expect(yield* availableOf(hall.id)).toBe(50)
        })
      ))

    it("should refuse a customer who does not own the aggregate", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const { aggregate } = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: holder.id, quantity: 2 }])

          const error = yield* Effect.flip(service.cancel(aggregate.id, customerY))

          expect(error._tag).toBe("ForbiddenError")
          expect(yield* availableOf(holder.id)).toBe(8)
        })
      ))

    it("should let an admin cancel", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const { aggregate } = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: holder.id, quantity: 2 }])

          const cancelled = yield* service.cancel(aggregate.id, admin)

          expect(cancelled.aggregate.status).toBe("CANCELLED")
          expect(yield* availableOf(holder.id)).toBe(10)
        })
      ))

    it("should refuse once preparation has started", () =>
      runTest(
        Effect.gen(function* () {
          const holder = yield* seedHolder("Widget", 10)
          const service = yield* AggregateService
          const { aggregate } = yield* service.createAggregate(ownerX, "ORDER", [{ holderId: holder.id, quantity: 2 }])
          yield* service.updateStatus(aggregate.id, "CONFIRMED")
          yield* service.updateStatus(aggregate.id, "PREPARING")

          const error = yield* Effect.flip(service.cancel(aggregate.id, customerX))

          expect(error).toMatchObject({
            _tag: "InvalidStatusTransitionError",
            currentStatus: "PREPARING",
            attemptedStatus: "CANCELLED"
          })
          expect(yield* availableOf(holder.id)).toBe(8)
        })
      ))
  })
})
