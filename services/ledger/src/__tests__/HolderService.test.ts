import { describe, it, expect } from "vitest"
import { Effect, Option } from "effect"
import { HolderService } from "../services/HolderService.js"
import { CreateHolderRequest } from "../domain/CapacityHolder.js"
import { runTest } from "./support/MemoryStore.js"
import { holderIdA } from "./support/fixtures.js"

describe("HolderService", () => {
  it("should create a holder with all capacity available", () =>
    runTest(
      Effect.gen(function* () {
        const holders = yield* HolderService

        const holder = yield* holders.create(
          new CreateHolderRequest({ kind: "EVENT", name: "Main Hall", totalCapacity: 250 })
        )

        expect(holder.totalCapacity).toBe(250)
        expect(holder.availableCapacity).toBe(250)
        expect(holder.priceCents).toBeNull()
        expect(yield* holders.findById(holder.id)).toEqual(holder)
      })
    ))

  it("should filter the list by kind", () =>
    runTest(
      Effect.gen(function* () {
        const holders = yield* HolderService
        yield* holders.create(new CreateHolderRequest({ kind: "EVENT", name: "Main Hall", totalCapacity: 250 }))
        yield* holders.create(new CreateHolderRequest({ kind: "PRODUCT", name: "Widget", totalCapacity: 5 }))

        const events = yield* holders.list(Option.some("EVENT"))
        const all = yield* holders.list(Option.none())

        expect(events.map((h) => h.name)).toEqual(["Main Hall"])
        expect(all).toHaveLength(2)
      })
    ))

  it("should change the price without touching capacity", () =>
    runTest(
      Effect.gen(function* () {
        const holders = yield* HolderService
        const holder = yield* holders.create(
          new CreateHolderRequest({ kind: "PRODUCT", name: "Widget", totalCapacity: 5, priceCents: 100 })
        )

        const updated = yield* holders.updatePrice(holder.id, 150)

        expect(updated.priceCents).toBe(150)
        expect(updated.availableCapacity).toBe(5)
      })
    ))

  it("should fail with HolderNotFound for an unknown id", () =>
    runTest(
      Effect.gen(function* () {
        const holders = yield* HolderService

        const error = yield* Effect.flip(holders.findById(holderIdA))

        expect(error).toMatchObject({ _tag: "HolderNotFoundError", holderId: holderIdA })
        expect((yield* Effect.flip(holders.updatePrice(holderIdA, 1)))._tag).toBe("HolderNotFoundError")
      })
    ))
})
