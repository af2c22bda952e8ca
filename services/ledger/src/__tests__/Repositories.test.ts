import { describe, it, expect } from "vitest"
import { DateTime } from "effect"
import { mapRowToHolder } from "../repositories/HolderRepositoryLive.js"
import { mapRowToAggregate, mapRowToReservation } from "../repositories/AggregateRepositoryLive.js"
import { mapRowToCartItem } from "../repositories/CartRepositoryLive.js"

const createdAt = new Date("2024-01-15T10:30:00.000Z")
const updatedAt = new Date("2024-01-16T08:00:00.000Z")

describe("row mapping", () => {
  describe("mapRowToHolder", () => {
    it("should map snake_case columns to a CapacityHolder", () => {
      const holder = mapRowToHolder({
        id: "550e8400-e29b-41d4-a716-446655440000",
        kind: "EVENT",
        name: "Main Hall",
        total_capacity: 100,
        available_capacity: 40,
        price_cents: null,
        created_at: createdAt,
        updated_at: updatedAt
      })

      expect(holder.id).toBe("550e8400-e29b-41d4-a716-446655440000")
      expect(holder.kind).toBe("EVENT")
      expect(holder.totalCapacity).toBe(100)
      expect(holder.availableCapacity).toBe(40)
      expect(holder.bookedAmount).toBe(60)
      expect(holder.priceCents).toBeNull()
      expect(DateTime.toEpochMillis(holder.createdAt)).toBe(createdAt.getTime())
      expect(DateTime.toEpochMillis(holder.updatedAt)).toBe(updatedAt.getTime())
    })

    it("should reject an unknown kind", () => {
      expect(() =>
        mapRowToHolder({
          id: "550e8400-e29b-41d4-a716-446655440000",
          kind: "VOUCHER",
          name: "Gift card",
          total_capacity: 1,
          available_capacity: 1,
          price_cents: 100,
          created_at: createdAt,
          updated_at: updatedAt
        })
      ).toThrow()
    })
  })

  describe("mapRowToAggregate", () => {
    it("should map an aggregate row", () => {
      const aggregate = mapRowToAggregate({
        id: "660e8400-e29b-41d4-a716-446655440001",
        human_id: "ORD-1705314600000-ABCDEFGH",
        kind: "ORDER",
        owner_id: "770e8400-e29b-41d4-a716-446655440002",
        status: "CONFIRMED",
        total_amount_cents: 5998,
        created_at: createdAt,
        updated_at: updatedAt
      })

      expect(aggregate.humanId).toBe("ORD-1705314600000-ABCDEFGH")
      expect(aggregate.kind).toBe("ORDER")
      expect(aggregate.ownerId).toBe("770e8400-e29b-41d4-a716-446655440002")
      expect(aggregate.status).toBe("CONFIRMED")
      expect(aggregate.totalAmountCents).toBe(5998)
    })

    it("should read a BIGINT total returned as a string", () => {
      const aggregate = mapRowToAggregate({
        id: "660e8400-e29b-41d4-a716-446655440001",
        human_id: "ORD-1-ABCDEFGH",
        kind: "ORDER",
        owner_id: "770e8400-e29b-41d4-a716-446655440002",
        status: "CREATED",
        total_amount_cents: "5000000000",
        created_at: createdAt,
        updated_at: updatedAt
      })

      expect(aggregate.totalAmountCents).toBe(5_000_000_000)
    })

    it("should reject an unknown status", () => {
      expect(() =>
        mapRowToAggregate({
          id: "660e8400-e29b-41d4-a716-446655440001",
          human_id: "ORD-1-ABCDEFGH",
          kind: "ORDER",
          owner_id: "770e8400-e29b-41d4-a716-446655440002",
          status: "SHIPPED",
          total_amount_cents: 0,
          created_at: createdAt,
          updated_at: updatedAt
        })
      ).toThrow()
    })
  })

  describe("mapRowToReservation", () => {
    it("should keep the snapshotted unit price", () => {
      const reservation = mapRowToReservation({
        id: "880e8400-e29b-41d4-a716-446655440005",
        aggregate_id: "660e8400-e29b-41d4-a716-446655440001",
        holder_id: "550e8400-e29b-41d4-a716-446655440000",
        line_no: 0,
        quantity: 2,
        unit_price_cents: 2999,
        created_at: createdAt
      })

      expect(reservation.aggregateId).toBe("660e8400-e29b-41d4-a716-446655440001")
      expect(reservation.holderId).toBe("550e8400-e29b-41d4-a716-446655440000")
      expect(reservation.quantity).toBe(2)
      expect(reservation.unitPriceCents).toBe(2999)
    })
  })

  describe("mapRowToCartItem", () => {
    it("should map a cart row", () => {
      const item = mapRowToCartItem({
        id: "990e8400-e29b-41d4-a716-446655440006",
        owner_id: "770e8400-e29b-41d4-a716-446655440002",
        holder_id: "550e8400-e29b-41d4-a716-446655440000",
        quantity: 3,
        created_at: createdAt
      })

      expect(item.ownerId).toBe("770e8400-e29b-41d4-a716-446655440002")
      expect(item.quantity).toBe(3)
    })
  })
})
