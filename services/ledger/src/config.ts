import { Config, Context, Effect, Layer, LogLevel } from "effect"

export class LedgerConfig extends Context.Tag("LedgerConfig")<
  LedgerConfig,
  {
    readonly port: number
    readonly defaultPageSize: number
    readonly maxPageSize: number
    readonly logLevel: LogLevel.LogLevel
  }
>() {}

export const LedgerConfigLive = Layer.effect(
  LedgerConfig,
  Effect.gen(function* () {
    const defaultPageSize = yield* Config.integer("DEFAULT_PAGE_SIZE").pipe(Config.withDefault(10))
    const maxPageSize = yield* Config.integer("MAX_PAGE_SIZE").pipe(Config.withDefault(100))
    return {
      port: yield* Config.integer("PORT").pipe(Config.withDefault(3004)),
      defaultPageSize: Math.min(defaultPageSize, maxPageSize),
      maxPageSize,
      logLevel: yield* Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))
    }
  })
)
