import { Layer } from "effect"
import { DatabaseLive } from "./db.js"
import { LedgerConfigLive } from "./config.js"
import { HumanIdGeneratorLive } from "./domain/HumanId.js"
import { UnitOfWorkLive } from "./repositories/UnitOfWork.js"
import { HolderRepositoryLive } from "./repositories/HolderRepositoryLive.js"
import { AggregateRepositoryLive } from "./repositories/AggregateRepositoryLive.js"
import { CartRepositoryLive } from "./repositories/CartRepositoryLive.js"
import { HolderServiceLive } from "./services/HolderServiceLive.js"
import { LedgerServiceLive } from "./services/LedgerServiceLive.js"
import { AggregateServiceLive } from "./services/AggregateServiceLive.js"
import { CartServiceLive } from "./services/CartServiceLive.js"

// Repository layer depends on database
const RepositoryLive = Layer.mergeAll(
  UnitOfWorkLive,
  HolderRepositoryLive,
  AggregateRepositoryLive,
  CartRepositoryLive
).pipe(Layer.provide(DatabaseLive))

// The aggregator builds on the ledger, so the ledger is provided to it first
const CoreLive = AggregateServiceLive.pipe(
  Layer.provideMerge(LedgerServiceLive),
  Layer.provide(HumanIdGeneratorLive)
)

// Service layer depends on repositories
const ServiceLive = Layer.mergeAll(
  HolderServiceLive,
  CartServiceLive,
  CoreLive
).pipe(Layer.provide(RepositoryLive))

// Export composed application layer
export const AppLive = Layer.mergeAll(
  DatabaseLive,
  LedgerConfigLive,
  ServiceLive
)
