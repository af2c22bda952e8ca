import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"
import { HealthRoutes } from "./health.js"
import { HolderRoutes } from "./holders.js"
import { CartRoutes } from "./cart.js"
import { OrderRoutes } from "./orders.js"
import { AggregateRoutes } from "./aggregates.js"

const rootRoute = HttpRouter.empty.pipe(
  HttpRouter.get(
    "/",
    Effect.succeed(HttpServerResponse.text("Hello from Ledger Service"))
  )
)

export const router = HttpRouter.empty.pipe(
  HttpRouter.concat(rootRoute),
  HttpRouter.concat(HealthRoutes),
  HttpRouter.concat(HolderRoutes),
  HttpRouter.concat(CartRoutes),
  HttpRouter.concat(OrderRoutes),
  HttpRouter.concat(AggregateRoutes)
)
