import { Layer, Effect, Option, DateTime, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { HolderRepository, type CreateHolderRow } from "./HolderRepository.js"
import { CapacityHolder, HolderId, HolderKind } from "../domain/CapacityHolder.js"
import type { ResizedCapacity } from "../domain/Ledger.js"

export interface HolderRow {
  id: string
  kind: string
  name: string
  total_capacity: number
  available_capacity: number
  price_cents: number | null
  created_at: Date
  updated_at: Date
}

export const mapRowToHolder = (row: HolderRow): CapacityHolder =>
  new CapacityHolder({
    id: Schema.decodeUnknownSync(HolderId)(row.id),
    kind: Schema.decodeUnknownSync(HolderKind)(row.kind),
    name: row.name,
    totalCapacity: row.total_capacity,
    availableCapacity: row.available_capacity,
    priceCents: row.price_cents,
    createdAt: DateTime.unsafeFromDate(row.created_at),
    updatedAt: DateTime.unsafeFromDate(row.updated_at)
  })

const firstHolder = (rows: ReadonlyArray<HolderRow>): Option.Option<CapacityHolder> =>
  Option.map(Option.fromNullable(rows[0]), mapRowToHolder)

export const HolderRepositoryLive = Layer.effect(
  HolderRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      insert: (row: CreateHolderRow) =>
        Effect.gen(function* () {
          const result = yield* sql<HolderRow>`
            INSERT INTO capacity_holders (kind, name, total_capacity, available_capacity, price_cents)
            VALUES (${row.kind}, ${row.name}, ${row.totalCapacity}, ${row.totalCapacity}, ${row.priceCents})
            RETURNING *
          `
          const inserted = result[0]
          // INSERT with RETURNING should always return exactly 1 row
          if (inserted === undefined) {
            return yield* Effect.die(new Error("INSERT capacity_holders returned no row"))
          }
          return mapRowToHolder(inserted)
        }),

      findById: (id: HolderId) =>
        sql<HolderRow>`
          SELECT * FROM capacity_holders WHERE id = ${id}::uuid
        `.pipe(Effect.map(firstHolder)),

      findByIds: (ids: ReadonlyArray<HolderId>) =>
        ids.length === 0
          ? Effect.succeed([])
          : sql<HolderRow>`
              SELECT * FROM capacity_holders WHERE id IN ${sql.in(ids)}
            `.pipe(Effect.map((rows) => rows.map(mapRowToHolder))),

      list: (kind: Option.Option<HolderKind>) =>
        Option.match(kind, {
          onNone: () => sql<HolderRow>`
            SELECT * FROM capacity_holders ORDER BY created_at, id
          `,
          onSome: (k) => sql<HolderRow>`
            SELECT * FROM capacity_holders WHERE kind = ${k} ORDER BY created_at, id
          `
        }).pipe(Effect.map((rows) => rows.map(mapRowToHolder))),

      lockForUpdate: (ids: ReadonlyArray<HolderId>) =>
        ids.length === 0
          ? Effect.succeed([])
          : sql<HolderRow>`
              SELECT *
              FROM capacity_holders
              WHERE id IN ${sql.in(ids)}
              ORDER BY id
              FOR UPDATE
            `.pipe(Effect.map((rows) => rows.map(mapRowToHolder))),

      // Single statement: the bounds check and the write cannot interleave
      applyDelta: (id: HolderId, delta: number) =>
        sql<HolderRow>`
          UPDATE capacity_holders
          SET available_capacity = available_capacity + ${delta},
              updated_at = NOW()
          WHERE id = ${id}::uuid
            AND available_capacity + ${delta} >= 0
            AND available_capacity + ${delta} <= total_capacity
          RETURNING *
        `.pipe(Effect.map(firstHolder)),

      updateCapacity: (id: HolderId, capacity: ResizedCapacity) =>
        sql<HolderRow>`
          UPDATE capacity_holders
          SET total_capacity = ${capacity.totalCapacity},
              available_capacity = ${capacity.availableCapacity},
              updated_at = NOW()
          WHERE id = ${id}::uuid
          RETURNING *
        `.pipe(Effect.map(firstHolder)),

      updatePrice: (id: HolderId, priceCents: number | null) =>
        sql<HolderRow>`
          UPDATE capacity_holders
          SET price_cents = ${priceCents},
              updated_at = NOW()
          WHERE id = ${id}::uuid
          RETURNING *
        `.pipe(Effect.map(firstHolder))
    }
  })
)
