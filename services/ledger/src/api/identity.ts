import { HttpServerRequest } from "@effect/platform"
import { Effect } from "effect"
import { IdentityHeaders, Requester } from "../domain/Identity.js"
import { ForbiddenError, MissingIdentityError } from "../domain/errors.js"

/**
 * Caller identity from the `x-user-id` and `x-user-role` headers.
 * Absent or malformed headers fail with MissingIdentityError.
 */
export const requireIdentity = HttpServerRequest.schemaHeaders(IdentityHeaders).pipe(
  Effect.map((headers) => new Requester({ userId: headers["x-user-id"], role: headers["x-user-role"] })),
  Effect.catchTag("ParseError", () => Effect.fail(new MissingIdentityError()))
)

export const requireAdmin = requireIdentity.pipe(
  Effect.filterOrFail(
    (requester) => requester.isAdmin,
    (requester) => new ForbiddenError({ requesterId: requester.userId, resource: "admin" })
  )
)
