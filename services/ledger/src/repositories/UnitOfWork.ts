import { Context, Effect, Layer } from "effect"
import { SqlClient, SqlError } from "@effect/sql"

/**
 * Transaction boundary for services. Every repository call made inside
 * `withTransaction` commits or rolls back together; a failure in the wrapped
 * effect rolls back.
 */
export class UnitOfWork extends Context.Tag("UnitOfWork")<
  UnitOfWork,
  {
    readonly withTransaction: <A, E, R>(
      effect: Effect.Effect<A, E, R>
    ) => Effect.Effect<A, E | SqlError.SqlError, R>
  }
>() {}

export const UnitOfWorkLive = Layer.effect(
  UnitOfWork,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient
    // Nested calls reuse the outer transaction through a savepoint
    return {
      withTransaction: <A, E, R>(effect: Effect.Effect<A, E, R>) => sql.withTransaction(effect)
    }
  })
)
