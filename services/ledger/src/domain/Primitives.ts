import { Schema } from "effect"

/**
 * UUID in canonical lowercase. Postgres returns `uuid` columns lowercased, so
 * ids decoded from requests are lowercased too and compare equal with `===`.
 */
export const Uuid = Schema.transform(Schema.String, Schema.UUID, {
  strict: true,
  decode: (value) => value.toLowerCase(),
  encode: (value) => value
})

// Largest value a Postgres INTEGER column holds
export const MAX_INT4 = 2_147_483_647

export const int4Message = () => `Value cannot exceed ${MAX_INT4}`
