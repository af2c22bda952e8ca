import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { SqlClient } from "@effect/sql"
import { Clock, Effect } from "effect"

const healthCheck = Effect.gen(function* () {
  const sql = yield* SqlClient.SqlClient
  const startTime = yield* Clock.currentTimeMillis
  yield* sql`SELECT 1`
  const latencyMs = (yield* Clock.currentTimeMillis) - startTime

  return yield* HttpServerResponse.json({
    status: "healthy",
    database: "connected",
    latency_ms: latencyMs
  })
}).pipe(
  Effect.catchAll((error) =>
    HttpServerResponse.json(
      { status: "unhealthy", database: "disconnected", error: String(error) },
      { status: 503 }
    )
  )
)

export const HealthRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/health", healthCheck)
)
