import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type {
  Aggregate,
  AggregateId,
  AggregateKind,
  AggregateStatus,
  AggregateWithItems,
  OwnerId
} from "../domain/Aggregate.js"
import type { HolderId } from "../domain/CapacityHolder.js"
import type { Reservation } from "../domain/Reservation.js"

export interface InsertReservationRow {
  readonly holderId: HolderId
  readonly quantity: number
  readonly unitPriceCents: number
}

export interface InsertAggregateRow {
  readonly humanId: string
  readonly kind: AggregateKind
  readonly ownerId: OwnerId
  readonly status: AggregateStatus
  readonly totalAmountCents: number
  readonly items: ReadonlyArray<InsertReservationRow>
}

export interface ListAggregatesFilter {
  readonly kind: Option.Option<AggregateKind>
  readonly offset: number
  readonly limit: number
}

export class AggregateRepository extends Context.Tag("AggregateRepository")<
  AggregateRepository,
  {
    /**
     * Inserts the aggregate and its reservation lines, keeping line order.
     * Callers wrap this in the same transaction as the capacity decrements.
     */
    readonly insertWithItems: (
      row: InsertAggregateRow
    ) => Effect.Effect<AggregateWithItems, SqlError.SqlError>

    readonly findById: (
      id: AggregateId
    ) => Effect.Effect<Option.Option<Aggregate>, SqlError.SqlError>

    /**
     * Same as findById but locks the row until the transaction ends.
     */
    readonly findByIdForUpdate: (
      id: AggregateId
    ) => Effect.Effect<Option.Option<Aggregate>, SqlError.SqlError>

    readonly findByHumanId: (
      humanId: string
    ) => Effect.Effect<Option.Option<Aggregate>, SqlError.SqlError>

    /**
     * Reservation lines of an aggregate in the order they were committed.
     */
    readonly getItems: (
      aggregateId: AggregateId
    ) => Effect.Effect<ReadonlyArray<Reservation>, SqlError.SqlError>

    /**
     * Newest first.
     */
    readonly listByOwner: (
      ownerId: OwnerId,
      filter: ListAggregatesFilter
    ) => Effect.Effect<ReadonlyArray<Aggregate>, SqlError.SqlError>

    readonly updateStatus: (
      id: AggregateId,
      status: AggregateStatus
    ) => Effect.Effect<Option.Option<Aggregate>, SqlError.SqlError>
  }
>() {}
