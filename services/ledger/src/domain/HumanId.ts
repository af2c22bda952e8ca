import { Clock, Context, Effect, Layer } from "effect"
import { randomBytes } from "node:crypto"
import type { AggregateKind } from "./Aggregate.js"

// Crockford base32: no I, L, O or U
const ALPHABET = "0123456789ABCDEFGHJKMNPQRSTVWXYZ"
const SUFFIX_LENGTH = 8

export const HUMAN_ID_PREFIX: Record<AggregateKind, string> = {
  ORDER: "ORD",
  BOOKING: "EVT"
}

/**
 * Formats a user-facing id: `<prefix>-<epoch millis>-<suffix>`.
 * Each suffix byte maps onto the 32-symbol alphabet.
 */
export const formatHumanId = (
  kind: AggregateKind,
  epochMillis: number,
  entropy: Uint8Array
): string => {
  const suffix = Array.from(entropy.subarray(0, SUFFIX_LENGTH), (byte) => ALPHABET[byte % 32]).join("")
  return `${HUMAN_ID_PREFIX[kind]}-${epochMillis}-${suffix}`
}

export const HUMAN_ID_PATTERN = /^(ORD|EVT)-\d+-[0-9A-HJKMNP-TV-Z]{8}$/

export class HumanIdGenerator extends Context.Tag("HumanIdGenerator")<
  HumanIdGenerator,
  {
    readonly next: (kind: AggregateKind) => Effect.Effect<string>
  }
>() {}

export const HumanIdGeneratorLive = Layer.succeed(HumanIdGenerator, {
  next: (kind: AggregateKind) =>
    Effect.gen(function* () {
      const millis = yield* Clock.currentTimeMillis
      const entropy = yield* Effect.sync(() => randomBytes(SUFFIX_LENGTH))
      return formatHumanId(kind, millis, entropy)
    })
})
