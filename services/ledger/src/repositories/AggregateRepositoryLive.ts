import { Layer, Effect, Option, DateTime, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import {
  AggregateRepository,
  type InsertAggregateRow,
  type ListAggregatesFilter
} from "./AggregateRepository.js"
import {
  Aggregate,
  AggregateId,
  AggregateKind,
  AggregateStatus,
  OwnerId
} from "../domain/Aggregate.js"
import { HolderId } from "../domain/CapacityHolder.js"
import { Reservation, ReservationId } from "../domain/Reservation.js"

export interface AggregateRow {
  id: string
  human_id: string
  kind: string
  owner_id: string
  status: string
  total_amount_cents: number | string
  created_at: Date
  updated_at: Date
}

export interface ReservationRow {
  id: string
  aggregate_id: string
  holder_id: string
  line_no: number
  quantity: number
  unit_price_cents: number
  created_at: Date
}

// pg returns BIGINT columns as strings
const AmountCents = Schema.Union(Schema.Int, Schema.NumberFromString.pipe(Schema.int()))

// Uses Schema.decodeUnknownSync for type-safe validation of branded types
export const mapRowToAggregate = (row: AggregateRow): Aggregate =>
  new Aggregate({
    id: Schema.decodeUnknownSync(AggregateId)(row.id),
    humanId: row.human_id,
    kind: Schema.decodeUnknownSync(AggregateKind)(row.kind),
    ownerId: Schema.decodeUnknownSync(OwnerId)(row.owner_id),
    status: Schema.decodeUnknownSync(AggregateStatus)(row.status),
    totalAmountCents: Schema.decodeUnknownSync(AmountCents)(row.total_amount_cents),
    createdAt: DateTime.unsafeFromDate(row.created_at),
    updatedAt: DateTime.unsafeFromDate(row.updated_at)
  })

export const mapRowToReservation = (row: ReservationRow): Reservation =>
  new Reservation({
    id: Schema.decodeUnknownSync(ReservationId)(row.id),
    aggregateId: row.aggregate_id,
    holderId: Schema.decodeUnknownSync(HolderId)(row.holder_id),
    quantity: row.quantity,
    unitPriceCents: row.unit_price_cents,
    createdAt: DateTime.unsafeFromDate(row.created_at)
  })

const firstAggregate = (rows: ReadonlyArray<AggregateRow>): Option.Option<Aggregate> =>
  Option.map(Option.fromNullable(rows[0]), mapRowToAggregate)

export const AggregateRepositoryLive = Layer.effect(
  AggregateRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      insertWithItems: (row: InsertAggregateRow) =>
        Effect.gen(function* () {
          const inserted = yield* sql<AggregateRow>`
            INSERT INTO aggregates (human_id, kind, owner_id, status, total_amount_cents)
            VALUES (${row.humanId}, ${row.kind}, ${row.ownerId}::uuid, ${row.status}, ${row.totalAmountCents})
            RETURNING *
          `
          const aggregateRow = inserted[0]
          if (aggregateRow === undefined) {
            return yield* Effect.die(new Error("INSERT aggregates returned no row"))
          }
          const aggregate = mapRowToAggregate(aggregateRow)

          // line_no preserves input order for reads
          const items: Reservation[] = []
          for (const [lineNo, item] of row.items.entries()) {
            const itemRows = yield* sql<ReservationRow>`
              INSERT INTO reservations (aggregate_id, holder_id, line_no, quantity, unit_price_cents)
              VALUES (${aggregate.id}::uuid, ${item.holderId}::uuid, ${lineNo}, ${item.quantity}, ${item.unitPriceCents})
              RETURNING *
            `
            const itemRow = itemRows[0]
            if (itemRow === undefined) {
              return yield* Effect.die(new Error("INSERT reservations returned no row"))
            }
            items.push(mapRowToReservation(itemRow))
          }

          return { aggregate, items }
        }),

      findById: (id: AggregateId) =>
        sql<AggregateRow>`
          SELECT * FROM aggregates WHERE id = ${id}::uuid
        `.pipe(Effect.map(firstAggregate)),

      findByIdForUpdate: (id: AggregateId) =>
        sql<AggregateRow>`
          SELECT * FROM aggregates WHERE id = ${id}::uuid FOR UPDATE
        `.pipe(Effect.map(firstAggregate)),

      findByHumanId: (humanId: string) =>
        sql<AggregateRow>`
          SELECT * FROM aggregates WHERE human_id = ${humanId}
        `.pipe(Effect.map(firstAggregate)),

      getItems: (aggregateId: AggregateId) =>
        sql<ReservationRow>`
          SELECT * FROM reservations
          WHERE aggregate_id = ${aggregateId}::uuid
          ORDER BY line_no
        `.pipe(Effect.map((rows) => rows.map(mapRowToReservation))),

      listByOwner: (ownerId: OwnerId, filter: ListAggregatesFilter) =>
        Option.match(filter.kind, {
          onNone: () => sql<AggregateRow>`
            SELECT * FROM aggregates
            WHERE owner_id = ${ownerId}::uuid
            ORDER BY created_at DESC, id
            LIMIT ${filter.limit} OFFSET ${filter.offset}
          `,
          onSome: (kind) => sql<AggregateRow>`
            SELECT * FROM aggregates
            WHERE owner_id = ${ownerId}::uuid AND kind = ${kind}
            ORDER BY created_at DESC, id
            LIMIT ${filter.limit} OFFSET ${filter.offset}
          `
        }).pipe(Effect.map((rows) => rows.map(mapRowToAggregate))),

      updateStatus: (id: AggregateId, status: AggregateStatus) =>
        sql<AggregateRow>`
          UPDATE aggregates
          SET status = ${status}, updated_at = NOW()
          WHERE id = ${id}::uuid
          RETURNING *
        `.pipe(Effect.map(firstAggregate))
    }
  })
)
