import { HttpServer } from "@effect/platform"
import { NodeHttpServer, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer, Logger } from "effect"
import { createServer } from "node:http"
import { router } from "./api/router.js"
import { LedgerConfig } from "./config.js"
import { AppLive } from "./layers.js"
import { TelemetryLive } from "./telemetry.js"

// Port and log level come from config, so the server layer is built from it
const HttpLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* LedgerConfig
    return router.pipe(
      HttpServer.serve(),
      HttpServer.withLogAddress,
      Layer.provide(NodeHttpServer.layer(createServer, { port: config.port })),
      Layer.provide(Logger.minimumLogLevel(config.logLevel))
    )
  })
).pipe(
  Layer.provide(AppLive),
  Layer.provide(TelemetryLive)
)

Layer.launch(HttpLive).pipe(NodeRuntime.runMain)
