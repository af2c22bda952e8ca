import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type { CapacityHolder, HolderId, HolderKind } from "../domain/CapacityHolder.js"
import type { ResizedCapacity } from "../domain/Ledger.js"

export interface CreateHolderRow {
  readonly kind: HolderKind
  readonly name: string
  readonly totalCapacity: number
  readonly priceCents: number | null
}

export class HolderRepository extends Context.Tag("HolderRepository")<
  HolderRepository,
  {
    readonly insert: (row: CreateHolderRow) => Effect.Effect<CapacityHolder, SqlError.SqlError>
    readonly findById: (id: HolderId) => Effect.Effect<Option.Option<CapacityHolder>, SqlError.SqlError>
    readonly findByIds: (
      ids: ReadonlyArray<HolderId>
    ) => Effect.Effect<ReadonlyArray<CapacityHolder>, SqlError.SqlError>
    readonly list: (
      kind: Option.Option<HolderKind>
    ) => Effect.Effect<ReadonlyArray<CapacityHolder>, SqlError.SqlError>

    /**
     * Locks the given holder rows for the rest of the current transaction.
     * Rows come back ordered by id, the order in which locks are taken.
     * Missing ids are simply absent from the result.
     */
    readonly lockForUpdate: (
      ids: ReadonlyArray<HolderId>
    ) => Effect.Effect<ReadonlyArray<CapacityHolder>, SqlError.SqlError>

    /**
     * Conditionally adds `delta` to the available counter.
     * Returns Option.none() when the holder is missing or the result would
     * leave [0, totalCapacity]; the row is untouched in that case.
     */
    readonly applyDelta: (
      id: HolderId,
      delta: number
    ) => Effect.Effect<Option.Option<CapacityHolder>, SqlError.SqlError>

    readonly updateCapacity: (
      id: HolderId,
      capacity: ResizedCapacity
    ) => Effect.Effect<Option.Option<CapacityHolder>, SqlError.SqlError>

    readonly updatePrice: (
      id: HolderId,
      priceCents: number | null
    ) => Effect.Effect<Option.Option<CapacityHolder>, SqlError.SqlError>
  }
>() {}
