import type { AggregateKind, AggregateStatus } from "./Aggregate.js"

export const INITIAL_STATUS: Record<AggregateKind, AggregateStatus> = {
  ORDER: "CREATED",
  BOOKING: "CONFIRMED"
}

/**
 * Allowed status transitions per aggregate kind.
 * Statuses missing from a kind's table are never valid for it.
 */
export const VALID_TRANSITIONS: Record<
  AggregateKind,
  Partial<Record<AggregateStatus, readonly AggregateStatus[]>>
> = {
  ORDER: {
    CREATED: ["CONFIRMED", "CANCELLED"],
    CONFIRMED: ["PREPARING", "CANCELLED"],
    PREPARING: ["READY"],
    READY: ["DELIVERED"],
    DELIVERED: [], // Terminal state
    CANCELLED: [] // Terminal state
  },
  BOOKING: {
    CONFIRMED: ["CANCELLED"],
    CANCELLED: [] // Terminal state
  }
}

export const isValidTransition = (
  kind: AggregateKind,
  from: AggregateStatus,
  to: AggregateStatus
): boolean => (VALID_TRANSITIONS[kind][from] ?? []).includes(to)

export const isTerminal = (kind: AggregateKind, status: AggregateStatus): boolean =>
  (VALID_TRANSITIONS[kind][status] ?? []).length === 0

export const canCancel = (kind: AggregateKind, status: AggregateStatus): boolean =>
  isValidTransition(kind, status, "CANCELLED")
