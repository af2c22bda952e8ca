import { Layer, Effect, Option } from "effect"
import { HolderService } from "./HolderService.js"
import { HolderRepository } from "../repositories/HolderRepository.js"
import { HolderNotFoundError } from "../domain/errors.js"
import type { CreateHolderRequest, HolderId, HolderKind } from "../domain/CapacityHolder.js"

/** Converts an Option to an Effect, failing with the provided error if None */
export const fromOption =
  <E>(onNone: () => E) =>
  <A>(option: Option.Option<A>): Effect.Effect<A, E> =>
    Option.isSome(option) ? Effect.succeed(option.value) : Effect.fail(onNone())

export const HolderServiceLive = Layer.effect(
  HolderService,
  Effect.gen(function* () {
    const repo = yield* HolderRepository

    return {
      create: (request: CreateHolderRequest) =>
        repo.insert({
          kind: request.kind,
          name: request.name,
          totalCapacity: request.totalCapacity,
          priceCents: request.priceCents
        }).pipe(
          Effect.tap((holder) =>
            Effect.logInfo("Holder created", {
              holderId: holder.id,
              kind: holder.kind,
              totalCapacity: holder.totalCapacity
            })
          ),
          Effect.withSpan("HolderService.create")
        ),

      findById: (id: HolderId) =>
        repo.findById(id).pipe(
          Effect.flatMap(fromOption(() => new HolderNotFoundError({ holderId: id })))
        ),

      list: (kind: Option.Option<HolderKind>) => repo.list(kind),

      updatePrice: (id: HolderId, priceCents: number | null) =>
        repo.updatePrice(id, priceCents).pipe(
          Effect.flatMap(fromOption(() => new HolderNotFoundError({ holderId: id }))),
          Effect.tap((holder) =>
            Effect.logInfo("Holder price updated", { holderId: holder.id, priceCents })
          ),
          Effect.withSpan("HolderService.updatePrice")
        )
    }
  })
)
