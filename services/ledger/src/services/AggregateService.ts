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
import type { Requester } from "../domain/Identity.js"
import type {
  AggregateNotFoundError,
  AmountTooLargeError,
  CapacityOverflowError,
  EmptyInputError,
  ForbiddenError,
  HolderKindMismatchError,
  HolderNotFoundError,
  InsufficientCapacityError,
  InvalidQuantityError,
  InvalidStatusTransitionError
} from "../domain/errors.js"

export interface LineItem {
  readonly holderId: HolderId
  readonly quantity: number
}

export interface ListAggregatesOptions {
  readonly page: number
  readonly size: number
  readonly kind: Option.Option<AggregateKind>
}

export type CommitError =
  | EmptyInputError
  | HolderNotFoundError
  | HolderKindMismatchError
  | InsufficientCapacityError
  | InvalidQuantityError
  | AmountTooLargeError
  | SqlError.SqlError

export class AggregateService extends Context.Tag("AggregateService")<
  AggregateService,
  {
    /**
     * Commits an order or booking: reserves every line and persists the
     * aggregate in one transaction. Any failing line rolls the whole commit back.
     */
    readonly createAggregate: (
      ownerId: OwnerId,
      kind: AggregateKind,
      items: ReadonlyArray<LineItem>
    ) => Effect.Effect<AggregateWithItems, CommitError>

    /**
     * Commits the owner's cart as an order and empties the cart in the same
     * transaction. The cart is untouched when the commit fails.
     */
    readonly checkoutCart: (
      ownerId: OwnerId
    ) => Effect.Effect<AggregateWithItems, CommitError>

    readonly getAggregateById: (
      id: AggregateId,
      requester: Requester
    ) => Effect.Effect<AggregateWithItems, AggregateNotFoundError | ForbiddenError | SqlError.SqlError>

    readonly getAggregateByHumanId: (
      humanId: string,
      requester: Requester
    ) => Effect.Effect<AggregateWithItems, AggregateNotFoundError | ForbiddenError | SqlError.SqlError>

    readonly listForOwner: (
      ownerId: OwnerId,
      options: ListAggregatesOptions
    ) => Effect.Effect<ReadonlyArray<Aggregate>, SqlError.SqlError>

    /**
     * Administrative status change. Setting the current status again is a
     * no-op; cancellation goes through `cancel` so capacity is released.
     */
    readonly updateStatus: (
      id: AggregateId,
      status: AggregateStatus
    ) => Effect.Effect<
      AggregateWithItems,
      AggregateNotFoundError | InvalidStatusTransitionError | SqlError.SqlError
    >

    /**
     * Cancels the aggregate and returns every reserved quantity to its holder.
     * Idempotent: cancelling a cancelled aggregate returns it unchanged.
     */
    readonly cancel: (
      id: AggregateId,
      requester: Requester
    ) => Effect.Effect<
      AggregateWithItems,
      | AggregateNotFoundError
      | ForbiddenError
      | InvalidStatusTransitionError
      | HolderNotFoundError
      | CapacityOverflowError
      | InvalidQuantityError
      | SqlError.SqlError
    >
  }
>() {}
