import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type { CapacityHolder, CreateHolderRequest, HolderId, HolderKind } from "../domain/CapacityHolder.js"
import type { HolderNotFoundError } from "../domain/errors.js"

export class HolderService extends Context.Tag("HolderService")<
  HolderService,
  {
    /**
     * Creates a holder with its whole capacity available.
     */
    readonly create: (
      request: CreateHolderRequest
    ) => Effect.Effect<CapacityHolder, SqlError.SqlError>

    readonly findById: (
      id: HolderId
    ) => Effect.Effect<CapacityHolder, HolderNotFoundError | SqlError.SqlError>

    readonly list: (
      kind: Option.Option<HolderKind>
    ) => Effect.Effect<ReadonlyArray<CapacityHolder>, SqlError.SqlError>

    /**
     * Changes the current price. Reservations already committed keep their
     * snapshot.
     */
    readonly updatePrice: (
      id: HolderId,
      priceCents: number | null
    ) => Effect.Effect<CapacityHolder, HolderNotFoundError | SqlError.SqlError>
  }
>() {}
